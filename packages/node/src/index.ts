/**
 * @matchpool/node — package public API.
 *
 * The HTTP host for matching pools. `main.ts` is the executable entry;
 * everything a test or embedding process needs is exported here.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { loadConfig, parseGenesisBalances, ConfigSchema } from "./config.js";
export type { AppConfig, GenesisBalance } from "./config.js";
export { SystemBlockClock, ManualBlockClock } from "./clock.js";
export type { BlockClock, SystemBlockClockOptions } from "./clock.js";
export { PoolService, deriveEscrowAddress } from "./services/pool-service.js";
export type { PoolServiceConfig, PoolView } from "./services/pool-service.js";
export { PoolRegistry, RegistryError } from "./services/pool-registry.js";
export type { PoolRegistryConfig, RegistryErrorCode } from "./services/pool-registry.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
