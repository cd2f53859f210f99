/**
 * ToastStyleProvider - Default style for every toast view in a subtree
 *
 * Usage:
 * ```tsx
 * <ToastStyleProvider style={toastStyles.fade}>
 *   <App />
 * </ToastStyleProvider>
 * ```
 *
 * A `style` prop on an individual view still wins.
 */

import { createContext, type ReactNode } from "react";
import type { ToastStyle } from "./types";

export const ToastStyleContext = createContext<Readonly<ToastStyle> | null>(null);

export interface ToastStyleProviderProps {
  style: Readonly<ToastStyle>;
  children: ReactNode;
}

export function ToastStyleProvider({ style, children }: ToastStyleProviderProps) {
  return (
    <ToastStyleContext.Provider value={style}>
      {children}
    </ToastStyleContext.Provider>
  );
}
