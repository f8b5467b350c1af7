export interface RouteContext {
  /** Parsed JSON body; `{}` for requests without one. */
  body: unknown;
}

/** Returns the JSON body of a 200 response; throws to produce an error. */
export type RouteHandler = (ctx: RouteContext) => Promise<unknown>;

export type HttpMethod = "GET" | "POST";

export type RouteKey = `${HttpMethod} ${string}`;

export type RouteTable = Map<RouteKey, RouteHandler>;
