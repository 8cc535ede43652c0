import http from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { createExchange, matchPattern, Router } from "../http/router.js";
import { writeText } from "../helpers.js";

const servers: http.Server[] = [];

async function serve(router: Router): Promise<string> {
  const server = http.createServer((request, response) => {
    void router.serve(createExchange(request, response));
  });
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });
  servers.push(server);
  const address = server.address();
  if (!address || typeof address !== "object") {
    throw new Error("Failed to bind test server");
  }
  return `http://127.0.0.1:${address.port}`;
}

afterEach(async () => {
  for (const server of servers.splice(0)) {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});

describe("matchPattern", () => {
  it("matches parameters and single-segment wildcards", () => {
    expect(matchPattern("/users/:id", "/users/42")).toBe(true);
    expect(matchPattern("/users/:id", "/users/42/posts")).toBe(false);
    expect(matchPattern("/a/*/c", "/a/b/c")).toBe(true);
    expect(matchPattern("/a/*/c", "/a/b/d")).toBe(false);
  });

  it("lets a trailing wildcard accept any remainder", () => {
    expect(matchPattern("/app/*", "/app/")).toBe(true);
    expect(matchPattern("/app/*", "/app/deep/nested/file.js")).toBe(true);
    expect(matchPattern("/app/*", "/other/file.js")).toBe(false);
    expect(matchPattern("/app/*", "/")).toBe(false);
  });
});

describe("router", () => {
  it("prefers an exact route over an earlier pattern", async () => {
    const router = new Router();
    router.get("/items/:id", (exchange) => writeText(exchange.response, 200, "pattern"));
    router.get("/items/special", (exchange) => writeText(exchange.response, 200, "exact"));
    const baseUrl = await serve(router);

    const exact = await fetch(`${baseUrl}/items/special`);
    expect(await exact.text()).toBe("exact\n");
    const pattern = await fetch(`${baseUrl}/items/7`);
    expect(await pattern.text()).toBe("pattern\n");
  });

  it("answers 405 with an Allow header when only the method differs", async () => {
    const router = new Router();
    router.get("/things", (exchange) => writeText(exchange.response, 200, "list"));
    router.delete("/things", (exchange) => writeText(exchange.response, 200, "gone"));
    const baseUrl = await serve(router);

    const response = await fetch(`${baseUrl}/things`, { method: "POST" });
    expect(response.status).toBe(405);
    expect(response.headers.get("allow")).toBe("GET, DELETE");
    expect(await response.text()).toBe("Method Not Allowed\n");
  });

  it("answers 404 for unknown paths", async () => {
    const router = new Router();
    router.get("/known", (exchange) => writeText(exchange.response, 200, "ok"));
    const baseUrl = await serve(router);

    const response = await fetch(`${baseUrl}/unknown`);
    expect(response.status).toBe(404);
    expect(await response.text()).toBe("404 page not found\n");
  });

  it("runs middleware in registration order, outermost first", async () => {
    const router = new Router();
    const order: string[] = [];
    router.use((next) => async (exchange) => {
      order.push("first:before");
      await next(exchange);
      order.push("first:after");
      writeText(exchange.response, 200, order.join(","));
    });
    router.use((next) => async (exchange) => {
      order.push("second:before");
      await next(exchange);
      order.push("second:after");
    });
    router.get("/", () => {
      order.push("handler");
    });
    const baseUrl = await serve(router);

    const response = await fetch(`${baseUrl}/`);
    expect(await response.text()).toBe("first:before,second:before,handler,second:after,first:after\n");
  });

  it("reports allowed methods across exact and pattern entries", () => {
    const router = new Router();
    router.get("/files/*", () => undefined);
    router.put("/files/readme", () => undefined);
    expect(router.allowedMethods("/files/readme")).toEqual(["GET", "PUT"]);
    expect(router.allowedMethods("/files/other")).toEqual(["GET"]);
    expect(router.resolve("post", "/files/readme")).toBeNull();
  });
});
