import { createLogger } from "../../../lib/logger";
import type { ToastStyle } from "./types";

const log = createLogger("ToastStyle");

export const DEFAULT_HIDE_AFTER_MS = 2000;
export const PRESET_HIDE_AFTER_MS = 3000;

const defaults: ToastStyle = {
  alignment: "bottom",
  hideAfterMs: DEFAULT_HIDE_AFTER_MS,
  animation: null,
  tapToDismiss: true,
  transition: "slide",
};

/**
 * Builds a frozen style record, filling in defaults for omitted fields.
 *
 * @example
 * const sticky = createToastStyle({ hideAfterMs: null, alignment: "top" });
 */
export function createToastStyle(
  overrides: Partial<ToastStyle> = {}
): Readonly<ToastStyle> {
  const style: ToastStyle = { ...defaults, ...overrides };

  if (
    style.hideAfterMs !== null &&
    (!Number.isFinite(style.hideAfterMs) || style.hideAfterMs <= 0)
  ) {
    // Passed through unchanged; the timer fires on the next tick.
    log.warn("hideAfterMs should be a positive number, got", style.hideAfterMs);
  }

  if (style.animation) {
    style.animation = Object.freeze({ ...style.animation });
  }

  return Object.freeze(style);
}

export const toastStyles = {
  slide: createToastStyle({ hideAfterMs: PRESET_HIDE_AFTER_MS, transition: "slide" }),
  fade: createToastStyle({ hideAfterMs: PRESET_HIDE_AFTER_MS, transition: "fade" }),
  scale: createToastStyle({ hideAfterMs: PRESET_HIDE_AFTER_MS, transition: "scale" }),
} as const;
