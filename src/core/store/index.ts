export { type RunStore, type RunRecord, InMemoryRunStore } from "./run-store";
export { type RedisRunStoreClient, RedisRunStore, createRedisClient } from "./redis-run-store";
