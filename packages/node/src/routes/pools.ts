/**
 * Matching pool routes.
 *
 * POST   /api/v1/pools                                   — Instantiate a pool
 * GET    /api/v1/pools                                   — List pool ids
 * GET    /api/v1/pools/:poolId                           — Pool config, status, escrow
 * POST   /api/v1/pools/:poolId/proposals                 — Create a proposal
 * GET    /api/v1/pools/:poolId/proposals                 — List proposals
 * GET    /api/v1/pools/:poolId/proposals/:id             — Get a proposal
 * GET    /api/v1/pools/:poolId/proposals/:id/contributions — List contributions
 * POST   /api/v1/pools/:poolId/proposals/:id/contributions — Contribute
 * GET    /api/v1/pools/:poolId/distribution/preview      — Preview matching
 * POST   /api/v1/pools/:poolId/distribution              — Trigger distribution
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ContributeSchema,
  CreatePoolSchema,
  CreateProposalSchema,
  ProposalIdSchema,
} from "../types/dto.js";
import type { ContributeDto, CreatePoolDto, CreateProposalDto } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { senderMiddleware } from "../middleware/sender.js";
import type { PoolRegistry } from "../services/pool-registry.js";

export function createPoolRoutes(registry: PoolRegistry): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", senderMiddleware());

  // ─── Pools ──────────────────────────────────────────────────────────

  routes.post("/", validateBody(CreatePoolSchema), (c) => {
    const { id, funds, ...msg } = c.get("validatedBody") as CreatePoolDto;

    const service = registry.create(id, c.get("sender"), msg, funds);

    return c.json({ data: service.view() }, 201);
  });

  routes.get("/", (c) => {
    return c.json({ data: registry.poolIds() });
  });

  routes.get("/:poolId", (c) => {
    const service = registry.get(c.req.param("poolId"));
    return c.json({ data: service.view() });
  });

  // ─── Proposals ──────────────────────────────────────────────────────

  routes.post("/:poolId/proposals", validateBody(CreateProposalSchema), (c) => {
    const service = registry.get(c.req.param("poolId"));
    const body = c.get("validatedBody") as CreateProposalDto;

    const res = service.createProposal(c.get("sender"), body);

    return c.json({ data: { proposalId: res.value, attributes: res.attributes } }, 201);
  });

  routes.get("/:poolId/proposals", (c) => {
    const service = registry.get(c.req.param("poolId"));
    return c.json({ data: service.listProposals() });
  });

  routes.get("/:poolId/proposals/:id", (c) => {
    const service = registry.get(c.req.param("poolId"));
    const id = ProposalIdSchema.parse(c.req.param("id"));
    return c.json({ data: service.getProposal(id) });
  });

  // ─── Contributions ──────────────────────────────────────────────────

  routes.get("/:poolId/proposals/:id/contributions", (c) => {
    const service = registry.get(c.req.param("poolId"));
    const id = ProposalIdSchema.parse(c.req.param("id"));
    return c.json({ data: service.listContributions(id) });
  });

  routes.post("/:poolId/proposals/:id/contributions", validateBody(ContributeSchema), (c) => {
    const service = registry.get(c.req.param("poolId"));
    const id = ProposalIdSchema.parse(c.req.param("id"));
    const body = c.get("validatedBody") as ContributeDto;

    const res = service.contribute(c.get("sender"), id, body.funds);

    return c.json({ data: { collectedFunds: res.value, attributes: res.attributes } });
  });

  // ─── Distribution ───────────────────────────────────────────────────

  routes.get("/:poolId/distribution/preview", (c) => {
    const service = registry.get(c.req.param("poolId"));
    return c.json({ data: service.previewDistribution() });
  });

  routes.post("/:poolId/distribution", (c) => {
    const service = registry.get(c.req.param("poolId"));

    const res = service.triggerDistribution(c.get("sender"));

    return c.json({
      data: { result: res.value, transfers: res.transfers, attributes: res.attributes },
    });
  });

  return routes;
}
