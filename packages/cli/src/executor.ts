import type { RequestContext, Workflow, WorkflowExecutor } from "@wfgate/core";

/**
 * Fallback used when no executor module is configured: answers every route
 * with the target action id and a summary of what was received.
 */
export function createEchoExecutor(): WorkflowExecutor {
  return {
    execute(workflow: Workflow, request: RequestContext) {
      return {
        actionId: workflow.metadata.targetActionId,
        workflow: workflow.metadata.name,
        request: {
          method: request.method,
          path: request.path,
          query: request.query,
          body: request.body,
          files: request.files.map((file) => ({ name: file.name, size: file.size, mimeType: file.mimeType }))
        }
      };
    }
  };
}
