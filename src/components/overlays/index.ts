// Toast overlay
export * from "./toast";
