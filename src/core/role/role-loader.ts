/**
 * RoleLoader - loads stage role definitions from Markdown files.
 *
 * Each <name>.md file has YAML frontmatter with:
 *   - name (required): lowercase alphanumeric with single hyphens, matches the file name
 *   - role (required): display role
 *   - goal (required)
 *   - expectedOutput (required)
 *   - capabilities (optional): list of capability kinds
 * The Markdown body is the role's backstory.
 */

import * as fs from "fs";
import * as path from "path";
import matter from "gray-matter";
import { z } from "zod";
import { RoleDefinition } from "./role-definition";
import { CAPABILITY_KINDS, CapabilityKind } from "../capabilities/capability";
import { PipelineConfigurationError } from "../errors/pipeline-errors";

const ROLE_NAME_REGEX = /^[a-z0-9]+(-[a-z0-9]+)*$/;

/** Bundled definitions; same relative depth from src/ and dist/ */
export const DEFAULT_ROLES_DIR = path.resolve(__dirname, "../../../roles");

const RoleFrontmatterSchema = z.object({
  name: z.string().regex(ROLE_NAME_REGEX, "must be lowercase words joined by single hyphens"),
  role: z.string().min(1),
  goal: z.string().min(1),
  expectedOutput: z.string().min(1),
  capabilities: z
    .array(z.string())
    .default([])
    .refine(
      (kinds): kinds is CapabilityKind[] => kinds.every(isCapabilityKind),
      { message: `capabilities must be drawn from ${CAPABILITY_KINDS.join(", ")}` }
    ),
});

/**
 * Load and validate a single role file.
 *
 * @throws PipelineConfigurationError when the frontmatter is invalid
 */
export function loadRoleFile(filePath: string): RoleDefinition {
  const raw = fs.readFileSync(filePath, "utf-8");
  const { data, content } = matter(raw);

  const parsed = RoleFrontmatterSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new PipelineConfigurationError(
      `Invalid role definition in ${filePath}: ${issues.join("; ")}`
    );
  }

  const expectedName = path.basename(filePath, ".md");
  if (parsed.data.name !== expectedName) {
    throw new PipelineConfigurationError(
      `Role name "${parsed.data.name}" doesn't match file name "${expectedName}" in ${filePath}`
    );
  }

  return {
    name: parsed.data.name,
    role: parsed.data.role,
    goal: parsed.data.goal,
    expectedOutput: parsed.data.expectedOutput,
    capabilities: parsed.data.capabilities,
    backstory: content.trim(),
    source: filePath,
  };
}

/**
 * Load every *.md role file in a directory, keyed by role name.
 */
export function loadRoles(dir: string = DEFAULT_ROLES_DIR): Map<string, RoleDefinition> {
  if (!fs.existsSync(dir)) {
    throw new PipelineConfigurationError(`Roles directory not found: ${dir}`);
  }

  const roles = new Map<string, RoleDefinition>();
  const files = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".md"))
    .map((entry) => entry.name)
    .sort();

  for (const file of files) {
    const definition = loadRoleFile(path.join(dir, file));
    roles.set(definition.name, definition);
  }

  console.log(`[RoleLoader] Loaded ${roles.size} role(s) from ${dir}`);
  return roles;
}

/**
 * Look up a role that the pipeline cannot run without.
 */
export function requireRole(roles: Map<string, RoleDefinition>, name: string): RoleDefinition {
  const role = roles.get(name);
  if (!role) {
    throw new PipelineConfigurationError(
      `Role "${name}" is not defined (available: ${Array.from(roles.keys()).join(", ") || "none"})`
    );
  }
  return role;
}

function isCapabilityKind(value: string): value is CapabilityKind {
  return CAPABILITY_KINDS.some((kind) => kind === value);
}
