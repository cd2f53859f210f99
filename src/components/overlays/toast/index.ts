/**
 * Toast overlay (single slot, auto-dismissing)
 *
 * Integration Point:
 * - ToastView / ItemToastView / MessageToastView wrap a host view
 * - ToastHost binds MessageToastView to the shared toastStore slot
 */

// Components
export { ToastView } from "./ToastView";
export type { ToastViewProps, ToastPhase } from "./ToastView";

export { ItemToastView } from "./ItemToastView";
export type { ItemToastViewProps } from "./ItemToastView";

export { MessageToastView } from "./MessageToastView";
export type { MessageToastViewProps } from "./MessageToastView";

export { ToastHost } from "./ToastHost";
export type { ToastHostProps } from "./ToastHost";

export { ToastStyleProvider } from "./ToastStyleProvider";
export type { ToastStyleProviderProps } from "./ToastStyleProvider";

// Hook
export { useToastStyle } from "./useToastStyle";

// State machine
export { ToastController } from "./toastController";
export type {
  ToastControllerOptions,
  ToastStateListener,
} from "./toastController";

// Configuration
export {
  createToastStyle,
  toastStyles,
  DEFAULT_HIDE_AFTER_MS,
  PRESET_HIDE_AFTER_MS,
} from "./toastStyle";
export { resolveTransition, transitionEdge } from "./transitions";
export type { TransitionDescriptor, TransitionEdge } from "./transitions";
export { overlayPlacement } from "./placement";
export { createToastMessage } from "./toastMessage";

// Types
export type {
  ToastAlignment,
  ToastTransition,
  ToastAnimation,
  ToastStyle,
  ToastVisibility,
  DismissReason,
  VisibilityBinding,
  ToastTone,
  ToastMessage,
} from "./types";
