import type { Gateway, GatewayContext } from "../gateway";

export type RouteArgs = {
  request: Request;
  url: URL;
  path: string;
  debug: boolean;
  reqId: string;
  startedAt: number;
  ctx: GatewayContext;
  gateway: Gateway;
};
