import http from "node:http";
import { writeText } from "../helpers.js";

export interface ExchangeLocals {
  requestId?: string;
  sessionId?: string;
  debugMode: boolean;
}

export interface HttpExchange {
  request: http.IncomingMessage;
  response: http.ServerResponse;
  url: URL;
  locals: ExchangeLocals;
}

export type Handler = (exchange: HttpExchange) => Promise<void> | void;
export type Middleware = (next: Handler) => Handler;

interface RouteEntry {
  pattern: string;
  handler: Handler;
}

/**
 * Segment matcher. `:name` and an interior `*` match one segment; a trailing
 * `*` accepts any remainder once the preceding literal segments match.
 */
export function matchPattern(pattern: string, requestPath: string): boolean {
  let patternParts = pattern.split("/");
  let pathParts = requestPath.split("/");

  if (patternParts.at(-1) === "*") {
    patternParts = patternParts.slice(0, -1);
    if (pathParts.length < patternParts.length) {
      return false;
    }
    pathParts = pathParts.slice(0, patternParts.length);
  } else if (patternParts.length !== pathParts.length) {
    return false;
  }

  return patternParts.every((part, index) => {
    if (part.startsWith(":") || part === "*") {
      return true;
    }
    return part === pathParts[index];
  });
}

export function createExchange(request: http.IncomingMessage, response: http.ServerResponse): HttpExchange {
  return {
    request,
    response,
    url: new URL(request.url ?? "/", "http://localhost"),
    locals: {
      debugMode: false
    }
  };
}

export class Router {
  // method -> pattern -> entry; Map keeps declaration order for pattern scans
  private readonly routes = new Map<string, Map<string, RouteEntry>>();
  private readonly middleware: Middleware[] = [];

  use(middleware: Middleware): void {
    this.middleware.push(middleware);
  }

  register(method: string, pattern: string, handler: Handler): void {
    const normalized = method.toUpperCase();
    let table = this.routes.get(normalized);
    if (!table) {
      table = new Map<string, RouteEntry>();
      this.routes.set(normalized, table);
    }
    table.set(pattern, { pattern, handler });
  }

  get(pattern: string, handler: Handler): void {
    this.register("GET", pattern, handler);
  }

  post(pattern: string, handler: Handler): void {
    this.register("POST", pattern, handler);
  }

  put(pattern: string, handler: Handler): void {
    this.register("PUT", pattern, handler);
  }

  delete(pattern: string, handler: Handler): void {
    this.register("DELETE", pattern, handler);
  }

  patch(pattern: string, handler: Handler): void {
    this.register("PATCH", pattern, handler);
  }

  options(pattern: string, handler: Handler): void {
    this.register("OPTIONS", pattern, handler);
  }

  resolve(method: string, requestPath: string): Handler | null {
    const table = this.routes.get(method.toUpperCase());
    if (!table) {
      return null;
    }
    const exact = table.get(requestPath);
    if (exact) {
      return exact.handler;
    }
    for (const entry of table.values()) {
      if (matchPattern(entry.pattern, requestPath)) {
        return entry.handler;
      }
    }
    return null;
  }

  allowedMethods(requestPath: string): string[] {
    const allowed: string[] = [];
    for (const [method, table] of this.routes) {
      if (table.has(requestPath)) {
        allowed.push(method);
        continue;
      }
      for (const entry of table.values()) {
        if (matchPattern(entry.pattern, requestPath)) {
          allowed.push(method);
          break;
        }
      }
    }
    return allowed;
  }

  /** Runs the exchange through every middleware, then the matched route. */
  async serve(exchange: HttpExchange): Promise<void> {
    const dispatch: Handler = async (current) => {
      const method = current.request.method ?? "GET";
      const requestPath = current.url.pathname;
      const handler = this.resolve(method, requestPath);
      if (handler) {
        await handler(current);
        return;
      }
      const allowed = this.allowedMethods(requestPath);
      if (allowed.length > 0) {
        current.response.setHeader("allow", allowed.join(", "));
        writeText(current.response, 405, "Method Not Allowed");
        return;
      }
      writeText(current.response, 404, "404 page not found");
    };
    await this.applyMiddleware(dispatch)(exchange);
  }

  applyMiddleware(handler: Handler): Handler {
    let wrapped = handler;
    for (let index = this.middleware.length - 1; index >= 0; index -= 1) {
      const middleware = this.middleware[index];
      if (middleware) {
        wrapped = middleware(wrapped);
      }
    }
    return wrapped;
  }
}

export function createRouter(): Router {
  return new Router();
}
