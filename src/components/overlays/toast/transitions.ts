/**
 * Declarative mapping from a toast style to its enter/exit animation.
 *
 * - fade: opacity only
 * - slide: moves in from the anchor's edge, combined with opacity
 * - scale: grows from the center, combined with opacity
 */

import type { CSSProperties } from "react";
import type { ToastAlignment, ToastStyle, ToastTransition } from "./types";

export type TransitionEdge = "top" | "bottom";

export interface TransitionDescriptor {
  kind: ToastTransition;
  edge: TransitionEdge;
  durationMs: number;
  easing: string;
  /** Styles applied before entering and while exiting */
  hidden: CSSProperties;
  /** Styles applied once entered */
  shown: CSSProperties;
}

const DEFAULT_DURATION_MS = 350;

const defaultEasing: Record<ToastTransition, string> = {
  fade: "linear",
  slide: "ease-in-out",
  scale: "linear",
};

const animatedProperties: Record<ToastTransition, string> = {
  fade: "opacity",
  slide: "opacity, transform",
  scale: "opacity, transform",
};

export function transitionEdge(alignment: ToastAlignment): TransitionEdge {
  switch (alignment) {
    case "top":
    case "top-left":
    case "top-right":
      return "top";
    case "bottom":
    case "bottom-left":
    case "bottom-right":
      return "bottom";
    default:
      return "top";
  }
}

function hiddenTransform(kind: ToastTransition, edge: TransitionEdge): string | undefined {
  switch (kind) {
    case "fade":
      return undefined;
    case "slide":
      return edge === "top" ? "translateY(-100%)" : "translateY(100%)";
    case "scale":
      return "scale(0)";
  }
}

function shownTransform(kind: ToastTransition): string | undefined {
  switch (kind) {
    case "fade":
      return undefined;
    case "slide":
      return "translateY(0)";
    case "scale":
      return "scale(1)";
  }
}

export function resolveTransition(style: Readonly<ToastStyle>): TransitionDescriptor {
  const kind = style.transition;
  const edge = transitionEdge(style.alignment);
  const durationMs = style.animation?.durationMs ?? DEFAULT_DURATION_MS;
  const easing = style.animation?.easing ?? defaultEasing[kind];

  const base: CSSProperties = {
    transitionProperty: animatedProperties[kind],
    transitionDuration: `${durationMs}ms`,
    transitionTimingFunction: easing,
    zIndex: 1,
  };

  const hidden: CSSProperties = { ...base, opacity: 0 };
  const shown: CSSProperties = { ...base, opacity: 1 };

  const from = hiddenTransform(kind, edge);
  const to = shownTransform(kind);
  if (from !== undefined) hidden.transform = from;
  if (to !== undefined) shown.transform = to;

  return { kind, edge, durationMs, easing, hidden, shown };
}
