import { z } from "zod";

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE", "PATCH", "OPTIONS", "HEAD"] as const;

const stringList = z.array(z.string()).optional();

const httpMethodSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(HTTP_METHODS));

export const routeSchema = z.object({
  path: z.string().min(1).startsWith("/"),
  methods: z.array(httpMethodSchema).min(1)
});

export const corsSchema = z.object({
  enableCors: z.boolean().optional(),
  allowOrigins: stringList,
  allowMethods: stringList,
  allowHeaders: stringList,
  exposeHeaders: stringList,
  allowCredentials: z.boolean().optional(),
  maxAge: z.union([z.string(), z.number()]).optional()
});

export const apiServerSchema = z.object({
  hostIp: z.string().optional(),
  portNum: z.number().int().optional(),
  trustedProxies: stringList,
  routes: z.array(routeSchema).default([]),
  cors: corsSchema.optional()
});

export const webRouteSchema = z.object({
  path: z.string().min(1).startsWith("/"),
  serverType: z.string().min(1),
  publicPath: z.string().optional(),
  appPort: z.number().int().nonnegative().optional(),
  command: z.string().optional()
});

export const webServerSchema = z.object({
  hostIp: z.string().optional(),
  portNum: z.number().int().optional(),
  trustedProxies: stringList,
  routes: z.array(webRouteSchema).default([])
});

export const settingsSchema = z.object({
  hostIp: z.string().optional(),
  portNum: z.number().int().optional(),
  apiServerMode: z.boolean().optional(),
  webServerMode: z.boolean().optional(),
  apiServer: apiServerSchema.optional(),
  webServer: webServerSchema.optional(),
  agentSettings: z.record(z.unknown()).optional(),
  session: z.record(z.unknown()).optional()
});

export const resourceSchema = z
  .object({
    apiVersion: z.string().optional(),
    kind: z.string().optional(),
    metadata: z.object({
      actionId: z.string().min(1),
      name: z.string().default(""),
      description: z.string().optional(),
      category: z.string().optional(),
      requires: stringList
    }),
    run: z.record(z.unknown()).optional()
  })
  .passthrough();

export const workflowSchema = z.object({
  apiVersion: z.string().default(""),
  kind: z.string().default("Workflow"),
  metadata: z.object({
    name: z.string().min(1),
    version: z.union([z.string(), z.number()]).transform(String).default(""),
    description: z.string().default(""),
    targetActionId: z.string().min(1),
    workflows: stringList
  }),
  settings: settingsSchema.default({}),
  resources: z.array(resourceSchema).default([])
});
