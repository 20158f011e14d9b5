/**
 * PoolRegistry — Maps pool IDs to PoolService instances.
 *
 * All pools share one ledger; each holds its budget and contributions
 * in its own escrow address.
 */

import type { Logger } from "pino";
import type { Address, Coin } from "@matchpool/types";
import type { NativeLedger } from "@matchpool/ledger";
import { createAddressValidator, type AddressValidator, type InstantiateMsg } from "@matchpool/funding";
import type { BlockClock } from "../clock.js";
import { PoolService } from "./pool-service.js";

export type RegistryErrorCode = "POOL_EXISTS" | "POOL_NOT_FOUND";

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
  }
}

export interface PoolRegistryConfig {
  readonly ledger: NativeLedger;
  readonly clock: BlockClock;
  readonly addressPrefix: string;
  readonly logger?: Logger | undefined;
}

export class PoolRegistry {
  private readonly _pools = new Map<string, PoolService>();
  private readonly _config: PoolRegistryConfig;
  private readonly _validateAddress: AddressValidator;

  constructor(config: PoolRegistryConfig) {
    this._config = config;
    this._validateAddress = createAddressValidator(config.addressPrefix);
  }

  /**
   * Instantiate a new pool. The pool is registered only if
   * instantiation succeeds.
   */
  create(
    poolId: string,
    sender: Address,
    msg: InstantiateMsg,
    funds: readonly Coin[],
  ): PoolService {
    if (this._pools.has(poolId)) {
      throw new RegistryError("POOL_EXISTS", `Pool '${poolId}' already exists`);
    }

    const service = new PoolService({
      poolId,
      addressPrefix: this._config.addressPrefix,
      ledger: this._config.ledger,
      clock: this._config.clock,
      validateAddress: this._validateAddress,
      logger: this._config.logger,
    });
    service.instantiate(sender, msg, funds);

    this._pools.set(poolId, service);
    return service;
  }

  get(poolId: string): PoolService {
    const service = this._pools.get(poolId);
    if (service === undefined) {
      throw new RegistryError("POOL_NOT_FOUND", `Pool '${poolId}' not found`);
    }
    return service;
  }

  has(poolId: string): boolean {
    return this._pools.has(poolId);
  }

  /**
   * All pool IDs, in creation order.
   */
  poolIds(): readonly string[] {
    return [...this._pools.keys()];
  }
}
