export * from "./catalog";
export * from "./runtime-settings";
export * from "./engine";
export * from "./comparison";
export * from "./factory";
