/**
 * Visibility state machine behind a single toast slot.
 *
 * States: hidden, visible.
 * - show() while hidden arms the auto-dismiss timer (if the style has one)
 * - show() while visible restarts that timer from zero
 * - timer expiry or an allowed tap writes `false` to the binding
 * - the host writing `false` itself is picked up through sync()
 *
 * At most one timer is pending per controller. Every re-arm and every
 * dismissal clears the previous handle first.
 */

import { createLogger } from "../../../lib/logger";
import type {
  DismissReason,
  ToastStyle,
  ToastVisibility,
  VisibilityBinding,
} from "./types";

const log = createLogger("ToastController");

export type ToastStateListener = (state: ToastVisibility) => void;

export interface ToastControllerOptions {
  binding: VisibilityBinding;
  style: Readonly<ToastStyle>;
  /** Called after every dismissal, whatever triggered it */
  onDismiss?: (reason: DismissReason) => void;
}

export class ToastController {
  private state: ToastVisibility = "hidden";
  private timer: ReturnType<typeof setTimeout> | null = null;
  private listeners = new Set<ToastStateListener>();
  private destroyed = false;
  private style: Readonly<ToastStyle>;
  private readonly binding: VisibilityBinding;
  private readonly onDismiss?: (reason: DismissReason) => void;

  constructor({ binding, style, onDismiss }: ToastControllerOptions) {
    this.binding = binding;
    this.style = style;
    this.onDismiss = onDismiss;
  }

  getState(): ToastVisibility {
    return this.state;
  }

  get hasPendingTimer(): boolean {
    return this.timer !== null;
  }

  subscribe(listener: ToastStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Takes effect the next time the timer is armed. */
  updateStyle(style: Readonly<ToastStyle>): void {
    this.style = style;
  }

  show(): void {
    if (this.destroyed || !this.binding.get()) return;

    if (this.state === "visible") {
      log.debug("re-triggered, restarting timer");
      this.armTimer();
      return;
    }

    log.debug("shown");
    this.armTimer();
    this.setState("visible");
  }

  dismiss(reason: DismissReason): void {
    if (this.destroyed || this.state === "hidden") return;

    log.debug("dismissed:", reason);
    this.clearTimer();
    if (reason !== "external") {
      this.binding.set(false);
    }
    this.setState("hidden");
    this.onDismiss?.(reason);
  }

  /** Returns true when the tap dismissed the toast. */
  tap(): boolean {
    if (this.destroyed || !this.style.tapToDismiss || this.state !== "visible") {
      return false;
    }
    this.dismiss("tap");
    return true;
  }

  /** Reconciles the machine with the binding's current value. */
  sync(isPresented: boolean): void {
    if (isPresented && this.state === "hidden") {
      this.show();
    } else if (!isPresented && this.state === "visible") {
      this.dismiss("external");
    }
  }

  destroy(): void {
    this.clearTimer();
    this.listeners.clear();
    this.destroyed = true;
  }

  private armTimer(): void {
    this.clearTimer();
    const timeout = this.style.hideAfterMs;
    if (timeout === null) return;

    this.timer = setTimeout(() => {
      this.timer = null;
      this.dismiss(this.binding.get() ? "timeout" : "external");
    }, timeout);
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private setState(state: ToastVisibility): void {
    this.state = state;
    for (const listener of [...this.listeners]) {
      listener(state);
    }
  }
}
