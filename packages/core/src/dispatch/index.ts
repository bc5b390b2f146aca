export { AppHandler, CommandHandler, CommandHandlerSet, Handler, HandlerContext } from "./handlers.js";
export type { CommandHandlers, RunAppOptions } from "./handlers.js";
