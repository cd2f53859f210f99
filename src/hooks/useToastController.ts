import { useCallback, useEffect, useRef, useState } from "react";
import { ToastController } from "../components/overlays/toast/toastController";
import type {
  DismissReason,
  ToastStyle,
  ToastVisibility,
} from "../components/overlays/toast/types";

/**
 * Configuration options for useToastController hook.
 */
export interface UseToastControllerOptions {
  /** Current value of the host-owned visibility binding */
  isPresented: boolean;
  /** Receives `false` when the toast closes itself (timeout or tap) */
  onIsPresentedChange: (value: false) => void;
  style: Readonly<ToastStyle>;
  /** A new key while visible restarts the auto-dismiss timer */
  triggerKey?: string | number;
  /** Called after every dismissal, including ones the host made */
  onDismiss?: (reason: DismissReason) => void;
}

/**
 * Return type of the useToastController hook.
 */
export interface UseToastControllerReturn {
  state: ToastVisibility;
  /** Dismisses when the style allows tap-to-dismiss. Returns whether it did. */
  tap: () => boolean;
}

/**
 * Hook binding a ToastController to a component's lifetime.
 *
 * The controller is created on mount and destroyed on unmount, so no timer
 * outlives the view. Callbacks are read through refs: passing a fresh
 * closure each render never restarts a pending timer.
 *
 * @example
 * const [open, setOpen] = useState(false);
 * const { tap } = useToastController({
 *   isPresented: open,
 *   onIsPresentedChange: setOpen,
 *   style: toastStyles.fade,
 * });
 */
export function useToastController({
  isPresented,
  onIsPresentedChange,
  style,
  triggerKey,
  onDismiss,
}: UseToastControllerOptions): UseToastControllerReturn {
  const [state, setState] = useState<ToastVisibility>("hidden");
  const controllerRef = useRef<ToastController | null>(null);

  const presentedRef = useRef(isPresented);
  const onChangeRef = useRef(onIsPresentedChange);
  const onDismissRef = useRef(onDismiss);
  const styleRef = useRef(style);
  presentedRef.current = isPresented;
  onChangeRef.current = onIsPresentedChange;
  onDismissRef.current = onDismiss;
  styleRef.current = style;

  useEffect(() => {
    const controller = new ToastController({
      binding: {
        get: () => presentedRef.current,
        set: (value) => {
          presentedRef.current = value;
          onChangeRef.current(value);
        },
      },
      style: styleRef.current,
      onDismiss: (reason) => onDismissRef.current?.(reason),
    });
    controllerRef.current = controller;
    const unsubscribe = controller.subscribe(setState);
    controller.sync(presentedRef.current);

    return () => {
      unsubscribe();
      controller.destroy();
      controllerRef.current = null;
    };
  }, []);

  useEffect(() => {
    controllerRef.current?.updateStyle(style);
  }, [style]);

  // Also runs on state changes: a host may reopen in the same batch as a
  // self-dismissal, so isPresented stays true while the controller hid.
  const lastKeyRef = useRef(triggerKey);
  useEffect(() => {
    const controller = controllerRef.current;
    if (!controller) return;

    const keyChanged = lastKeyRef.current !== triggerKey;
    lastKeyRef.current = triggerKey;

    if (isPresented && keyChanged && controller.getState() === "visible") {
      controller.show();
    } else {
      controller.sync(isPresented);
    }
  }, [isPresented, state, triggerKey]);

  const tap = useCallback(() => controllerRef.current?.tap() ?? false, []);

  return { state, tap };
}
