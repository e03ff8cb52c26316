export { CommandHandler } from "./CommandHandler";
export type { CommandContext } from "./CommandHandler";
export { RollCommand } from "./RollCommand";
export type { RollCommandDeps } from "./RollCommand";
export { ListTargetsCommand } from "./ListTargetsCommand";
