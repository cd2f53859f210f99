import type { CSSProperties } from "react";
import type { ToastAlignment } from "./types";

type FlexPosition = "flex-start" | "center" | "flex-end";

const placements: Record<ToastAlignment, [vertical: FlexPosition, horizontal: FlexPosition]> = {
  "top-left": ["flex-start", "flex-start"],
  top: ["flex-start", "center"],
  "top-right": ["flex-start", "flex-end"],
  left: ["center", "flex-start"],
  center: ["center", "center"],
  right: ["center", "flex-end"],
  "bottom-left": ["flex-end", "flex-start"],
  bottom: ["flex-end", "center"],
  "bottom-right": ["flex-end", "flex-end"],
};

/**
 * Overlay layer covering the host frame, with the toast pinned to `alignment`.
 * The layer itself lets pointer events through to the host.
 */
export function overlayPlacement(alignment: ToastAlignment): CSSProperties {
  const [vertical, horizontal] = placements[alignment];
  return {
    position: "absolute",
    inset: 0,
    display: "flex",
    flexDirection: "column",
    justifyContent: vertical,
    alignItems: horizontal,
    pointerEvents: "none",
    overflow: "hidden",
  };
}
