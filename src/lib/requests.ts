import type { AdmissionPipeline } from "./admission";
import { CliError } from "./errors";
import type { LabController } from "./lifecycle";

export const REQUEST_ACTIONS = ["create", "stop", "delete", "status", "list"] as const;
export type RequestAction = (typeof REQUEST_ACTIONS)[number];

export interface LabRequest {
  identity: string;
  numericId: string;
  roles: string[];
  action: string;
  labType?: string;
}

export interface RequestHandlerDeps {
  admission: AdmissionPipeline;
  controller: LabController;
}

function isRequestAction(action: string): action is RequestAction {
  return REQUEST_ACTIONS.some((known) => known === action);
}

/**
 * Admits a requester and runs one lifecycle action on their behalf. The
 * requester's identity is the owner of every lab it touches.
 */
export async function handleRequest(deps: RequestHandlerDeps, request: LabRequest): Promise<Record<string, unknown>> {
  const action = request.action;
  if (!isRequestAction(action)) {
    throw new CliError({
      kind: "validation",
      message: `Unknown action: ${action}`,
      hint: `Use one of: ${REQUEST_ACTIONS.join(", ")}`
    });
  }
  const needsLab = action === "create" || action === "stop" || action === "delete";
  if (needsLab && !request.labType) {
    throw new CliError({ kind: "validation", message: `The ${action} action needs a lab type.` });
  }

  const admission = await deps.admission.admit({
    identity: request.identity,
    numericId: request.numericId,
    roles: request.roles,
    input: request.labType
  });
  const owner = request.identity;
  const target = admission.cleaned ?? "";
  const warning = admission.warning ? { warning: admission.warning } : {};

  switch (action) {
    case "create":
      return { ...(await deps.controller.create(owner, target)), ...warning };
    case "stop":
      return { ...(await deps.controller.stop(owner, target)), ...warning };
    case "delete":
      return { ...(await deps.controller.delete(owner, target)), ...warning };
    case "status":
      return { activeLabs: await deps.controller.status(owner), ...warning };
    case "list":
      return { labs: deps.controller.list().map((lab) => lab.id), ...warning };
  }
}
