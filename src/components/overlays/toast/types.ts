/**
 * Toast overlay types
 */

/** Anchor position of the toast inside its host frame */
export type ToastAlignment =
  | "top-left"
  | "top"
  | "top-right"
  | "left"
  | "center"
  | "right"
  | "bottom-left"
  | "bottom"
  | "bottom-right";

export type ToastTransition = "fade" | "slide" | "scale";

export interface ToastAnimation {
  durationMs: number;
  /** Any CSS timing function, e.g. "linear" or "cubic-bezier(...)" */
  easing: string;
}

export interface ToastStyle {
  alignment: ToastAlignment;
  /** Auto-dismiss timeout in ms (null = stays until tapped or closed by the host) */
  hideAfterMs: number | null;
  /** Overrides the transition's default animation when set */
  animation: ToastAnimation | null;
  tapToDismiss: boolean;
  transition: ToastTransition;
}

export type ToastVisibility = "hidden" | "visible";

export type DismissReason = "timeout" | "tap" | "external";

/**
 * Externally owned visibility cell.
 *
 * The controller only ever writes `false`; opening a toast is the host's job.
 */
export interface VisibilityBinding {
  get: () => boolean;
  set: (value: false) => void;
}

export type ToastTone = "info" | "success" | "warning" | "error";

export interface ToastMessage {
  id: string;
  message: string;
  tone: ToastTone;
}
