/**
 * MessageToastView component
 *
 * Layout:
 * ( [icon]  Saved to library )   <- tinted capsule, tone decides icon and tint
 */

import type { CSSProperties } from "react";
import { AlertTriangle, CheckCircle, Info, XCircle } from "lucide-react";
import { ItemToastView, type ItemToastViewProps } from "./ItemToastView";
import type { ToastMessage, ToastTone } from "./types";

export interface MessageToastViewProps
  extends Omit<ItemToastViewProps<ToastMessage>, "item" | "onItemChange" | "content"> {
  message: ToastMessage | null;
  onMessageChange: (message: null) => void;
}

const iconMap: Record<ToastTone, typeof CheckCircle> = {
  success: CheckCircle,
  error: XCircle,
  warning: AlertTriangle,
  info: Info,
};

const toneColors: Record<ToastTone, { icon: string; capsule: string }> = {
  success: {
    icon: "rgb(52, 199, 89)",
    capsule: "rgba(52, 199, 89, 0.3)",
  },
  error: {
    icon: "rgb(255, 59, 48)",
    capsule: "rgba(255, 59, 48, 0.3)",
  },
  warning: {
    icon: "rgb(255, 149, 0)",
    capsule: "rgba(255, 149, 0, 0.3)",
  },
  info: {
    icon: "rgb(0, 122, 255)",
    capsule: "rgba(0, 122, 255, 0.3)",
  },
};

const capsuleStyle: CSSProperties = {
  display: "flex",
  alignItems: "center",
  gap: "8px",
  padding: "12px 16px",
  borderRadius: "9999px",
};

export function MessageToastView({
  message,
  onMessageChange,
  ...rest
}: MessageToastViewProps) {
  return (
    <ItemToastView
      {...rest}
      item={message}
      onItemChange={onMessageChange}
      content={(current) => {
        const Icon = iconMap[current.tone];
        const colors = toneColors[current.tone];
        return (
          <div
            className="toast-message"
            style={{ ...capsuleStyle, backgroundColor: colors.capsule }}
            data-toast-tone={current.tone}
          >
            <Icon size={16} color={colors.icon} aria-hidden="true" />
            <span style={{ fontSize: "14px" }}>{current.message}</span>
          </div>
        );
      }}
    />
  );
}
