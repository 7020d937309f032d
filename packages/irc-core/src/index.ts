export * from "./types";
export * from "./errors";
export * from "./protocol/tagCodec";
export * from "./protocol/ircParser";
export * from "./protocol/serialize";
export * from "./protocol/message";
export * from "./protocol/caps";
export { MAX_PARAMS, isValidCommand, isValidTagKey } from "./protocol/grammar";
export * from "./casemap/caseMapping";
export * from "./casemap/maskMatch";
export * from "./registry/numerics";
export * from "./registry/commands";
export * from "./dispatch/lineDispatcher";
