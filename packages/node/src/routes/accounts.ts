/**
 * Ledger account routes.
 *
 * GET /api/v1/accounts/:address/balances         — All non-zero balances
 * GET /api/v1/accounts/:address/balances/:denom  — One balance (zero if none)
 */

import { Hono } from "hono";
import type { NativeLedger } from "@matchpool/ledger";
import type { AppEnv } from "../types/api-contract.js";

export function createAccountRoutes(ledger: NativeLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:address/balances", (c) => {
    return c.json({ data: ledger.balances(c.req.param("address")) });
  });

  routes.get("/:address/balances/:denom", (c) => {
    return c.json({ data: ledger.balance(c.req.param("address"), c.req.param("denom")) });
  });

  return routes;
}
