/**
 * ToastHost - Shows the shared toast slot above its children
 *
 * Usage:
 * ```tsx
 * <ToastHost>
 *   <App />
 * </ToastHost>
 *
 * // Anywhere
 * useToastStore.getState().showToast("Saved", "success");
 * ```
 */

import type { ReactNode } from "react";
import { useToastMessage, useToastStore } from "../../../stores/toastStore";
import { MessageToastView } from "./MessageToastView";
import type { DismissReason, ToastStyle } from "./types";

export interface ToastHostProps {
  style?: Readonly<ToastStyle>;
  onDismiss?: (reason: DismissReason) => void;
  className?: string;
  children?: ReactNode;
}

export function ToastHost({ style, onDismiss, className, children }: ToastHostProps) {
  const message = useToastMessage();
  const clearToast = useToastStore((s) => s.clearToast);

  return (
    <MessageToastView
      message={message}
      onMessageChange={clearToast}
      style={style}
      onDismiss={onDismiss}
      className={className}
    >
      {children}
    </MessageToastView>
  );
}
