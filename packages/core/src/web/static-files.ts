import fsp from "node:fs/promises";
import path from "node:path";
import serveStatic from "serve-static";
import { errorMessage } from "../errors.js";
import { isRecord, writeText } from "../helpers.js";
import type { HttpExchange } from "../http/router.js";
import type { RuntimeLog } from "../log.js";

export function resolvePublicPath(publicPath: string | undefined, workflowDir: string): string {
  const target = publicPath ?? "";
  return path.isAbsolute(target) ? target : path.join(workflowDir, target);
}

/** Removes the route prefix from a raw request URL, keeping the query string. */
export function stripRoutePrefix(rawUrl: string, prefix: string): string | null {
  const queryIndex = rawUrl.indexOf("?");
  const pathname = queryIndex >= 0 ? rawUrl.slice(0, queryIndex) : rawUrl;
  const search = queryIndex >= 0 ? rawUrl.slice(queryIndex) : "";
  if (!pathname.startsWith(prefix)) {
    return null;
  }
  let rest = pathname.slice(prefix.length);
  if (!rest.startsWith("/")) {
    rest = `/${rest}`;
  }
  return `${rest}${search}`;
}

function errorStatus(error: unknown): number {
  if (isRecord(error) && typeof error.status === "number") {
    return error.status;
  }
  return 500;
}

export async function serveStaticRoute(
  exchange: HttpExchange,
  routePath: string,
  root: string,
  log: RuntimeLog
): Promise<void> {
  try {
    await fsp.stat(root);
  } catch (error) {
    log.error("web.static_missing", "public path does not exist", {
      path: root,
      error: errorMessage(error)
    });
    writeText(exchange.response, 404, "Not Found");
    return;
  }

  const stripped = stripRoutePrefix(exchange.request.url ?? "/", routePath);
  if (stripped === null) {
    writeText(exchange.response, 404, "404 page not found");
    return;
  }

  const serve = serveStatic(root, { index: ["index.html"], fallthrough: true });
  const originalUrl = exchange.request.url;
  // directory redirects are built from originalUrl so they keep the route prefix
  Object.assign(exchange.request, { originalUrl });
  exchange.request.url = stripped;

  await new Promise<void>((resolve) => {
    exchange.response.once("close", () => resolve());
    serve(exchange.request, exchange.response, (error?: unknown) => {
      exchange.request.url = originalUrl;
      if (error) {
        writeText(exchange.response, errorStatus(error), errorMessage(error));
      } else {
        writeText(exchange.response, 404, "404 page not found");
      }
      resolve();
    });
  });
}
