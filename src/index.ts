export * from "./components/overlays";
export * from "./hooks";
export { useToastStore, useToastMessage } from "./stores/toastStore";
export type { ToastState } from "./stores/toastStore";
export {
  createLogger,
  configureLogger,
  getLogLevel,
  initLogger,
} from "./lib/logger";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger";
