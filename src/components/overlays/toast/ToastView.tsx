/**
 * ToastView component
 *
 * Layout:
 * +------------------------------------------+
 * | host content (children, fills the frame) |
 * |                                          |
 * |            [ toast content ]             |  <- anchored per style.alignment
 * +------------------------------------------+
 *
 * - Visibility follows the host's `isPresented` binding
 * - Auto-dismiss, tap-to-dismiss and timer restarts live in ToastController
 * - Content stays mounted through the exit transition, then unmounts
 */

import { useEffect, useMemo, useRef, useState, type ReactNode } from "react";
import { useToastController } from "../../../hooks/useToastController";
import { overlayPlacement } from "./placement";
import { resolveTransition } from "./transitions";
import { useToastStyle } from "./useToastStyle";
import type { DismissReason, ToastStyle } from "./types";

/** entering: mounted with hidden styles; shown: entered; exiting: leaving */
export type ToastPhase = "entering" | "shown" | "exiting" | "unmounted";

export interface ToastViewProps {
  isPresented: boolean;
  /** Receives `false` when the toast closes itself */
  onIsPresentedChange: (value: false) => void;
  /** Falls back to the nearest ToastStyleProvider, then the slide preset */
  style?: Readonly<ToastStyle>;
  content: () => ReactNode;
  /** A new key while visible restarts the auto-dismiss timer */
  triggerKey?: string | number;
  onDismiss?: (reason: DismissReason) => void;
  className?: string;
  children?: ReactNode;
}

export function ToastView({
  isPresented,
  onIsPresentedChange,
  style: styleOverride,
  content,
  triggerKey,
  onDismiss,
  className = "",
  children,
}: ToastViewProps) {
  const style = useToastStyle(styleOverride);
  const transition = useMemo(() => resolveTransition(style), [style]);
  const [phase, setPhase] = useState<ToastPhase>(
    isPresented ? "entering" : "unmounted"
  );
  const contentRef = useRef<HTMLDivElement>(null);

  const { state, tap } = useToastController({
    isPresented,
    onIsPresentedChange,
    style,
    triggerKey,
    onDismiss,
  });

  useEffect(() => {
    if (isPresented) {
      setPhase((prev) =>
        prev === "unmounted" || prev === "exiting" ? "entering" : prev
      );
    } else {
      setPhase((prev) => (prev === "unmounted" ? prev : "exiting"));
    }
  }, [isPresented]);

  useEffect(() => {
    if (phase === "entering") {
      // Commit the hidden styles before switching, so the browser animates
      contentRef.current?.getBoundingClientRect();
      setPhase("shown");
      return;
    }
    if (phase === "exiting") {
      const timer = setTimeout(() => setPhase("unmounted"), transition.durationMs);
      return () => clearTimeout(timer);
    }
  }, [phase, transition.durationMs]);

  return (
    <div
      className={`toast-host ${className}`.trim()}
      style={{ position: "relative", width: "100%", height: "100%" }}
      data-testid="toast-host"
    >
      {children}
      {phase !== "unmounted" && (
        <div style={overlayPlacement(style.alignment)} data-testid="toast-overlay">
          <div
            ref={contentRef}
            role="status"
            aria-live="polite"
            onClick={() => tap()}
            style={{
              pointerEvents: "auto",
              ...(phase === "shown" ? transition.shown : transition.hidden),
            }}
            data-testid="toast"
            data-state={phase}
            data-visibility={state}
            data-transition={transition.kind}
            data-alignment={style.alignment}
          >
            {content()}
          </div>
        </div>
      )}
    </div>
  );
}
