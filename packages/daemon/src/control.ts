import type { Orchestrator } from "@devpeace/core";

/** The orchestrator operations the control API exposes */
export type DaemonControl = Pick<
  Orchestrator,
  | "add"
  | "remove"
  | "list"
  | "status"
  | "orphans"
  | "associateOrphan"
  | "discardOrphan"
  | "worklogs"
  | "retry"
  | "start"
  | "stop"
  | "configure"
  | "transitionIssue"
>;
