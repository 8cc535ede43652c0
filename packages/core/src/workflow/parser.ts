import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import type { z } from "zod";
import { errorMessage, WorkflowParseError } from "../errors.js";
import { resourceSchema, workflowSchema } from "./schema.js";
import type { Resource, Workflow, WorkflowParser } from "./types.js";

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${location}: ${issue.message}`;
  });
}

async function readYaml(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new WorkflowParseError(filePath, `failed to read ${filePath}: ${errorMessage(error)}`);
  }
  try {
    return YAML.parse(text);
  } catch (error) {
    throw new WorkflowParseError(filePath, `invalid YAML in ${filePath}: ${errorMessage(error)}`);
  }
}

async function listResourceFiles(resourcesDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(resourcesDir);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
  return names
    .filter((name) => name.endsWith(".yaml") || name.endsWith(".yml"))
    .sort((left, right) => left.localeCompare(right))
    .map((name) => path.join(resourcesDir, name));
}

/**
 * Reads a workflow YAML file and the resource fragments in its sibling
 * `resources/` directory. Fragments are appended after inline resources.
 */
export class YamlWorkflowParser implements WorkflowParser {
  async parseWorkflow(filePath: string): Promise<Workflow> {
    const absolutePath = path.resolve(filePath);
    const raw = await readYaml(absolutePath);
    const parsed = workflowSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new WorkflowParseError(
        absolutePath,
        `invalid workflow ${absolutePath}: ${issues.join("; ")}`,
        issues
      );
    }

    const resources: Resource[] = [...parsed.data.resources];
    const resourcesDir = path.join(path.dirname(absolutePath), "resources");
    for (const resourcePath of await listResourceFiles(resourcesDir)) {
      const resourceRaw = await readYaml(resourcePath);
      const resource = resourceSchema.safeParse(resourceRaw ?? {});
      if (!resource.success) {
        const issues = formatIssues(resource.error);
        throw new WorkflowParseError(
          resourcePath,
          `invalid resource ${resourcePath}: ${issues.join("; ")}`,
          issues
        );
      }
      resources.push(resource.data);
    }

    return Object.freeze({
      ...parsed.data,
      resources
    });
  }
}

export function createWorkflowParser(): WorkflowParser {
  return new YamlWorkflowParser();
}
