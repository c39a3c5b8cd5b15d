export * from "./analysis";
export * from "./history";
