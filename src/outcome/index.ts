export * from "./diagnostic";
export * from "./codes";
export * from "./failure";
export * from "./errors";
export * from "./outcome";
