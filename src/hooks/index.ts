/**
 * Hooks barrel export.
 */

export { useToastController } from "./useToastController";
export type {
  UseToastControllerOptions,
  UseToastControllerReturn,
} from "./useToastController";
