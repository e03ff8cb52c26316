import type { ActionKind } from "../../types";
import type { ActionHandler } from "./types";
import { updateConfigs } from "./updateConfigs";
import { updateSystem } from "./updateSystem";
import { rebootHost } from "./rebootHost";

export const actionHandlers = {
  "update-configuration": updateConfigs,
  "update-system": updateSystem,
  "reboot-host": rebootHost,
} satisfies Record<ActionKind, ActionHandler>;

export function handlerFor(action: ActionKind): ActionHandler {
  return actionHandlers[action];
}

export type { ActionHandler } from "./types";
export { restartService } from "./restartService";
export { updateConfigs, updateSystem, rebootHost };
export type { RebootResult } from "./rebootHost";
