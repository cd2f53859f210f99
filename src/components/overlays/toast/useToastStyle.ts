import { useContext } from "react";
import { ToastStyleContext } from "./ToastStyleProvider";
import { toastStyles } from "./toastStyle";
import type { ToastStyle } from "./types";

/**
 * Resolves the style a toast view should use.
 *
 * Order: explicit override, then the nearest ToastStyleProvider, then the
 * slide preset.
 */
export function useToastStyle(override?: Readonly<ToastStyle>): Readonly<ToastStyle> {
  const provided = useContext(ToastStyleContext);
  return override ?? provided ?? toastStyles.slide;
}
