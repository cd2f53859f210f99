import { create } from "zustand";
import { createToastMessage } from "../components/overlays/toast/toastMessage";
import type { ToastMessage, ToastTone } from "../components/overlays/toast/types";

/**
 * Single shared toast slot managed by Zustand.
 *
 * Showing a message while another is visible replaces it; the view restarts
 * its timer for the new id. There is never more than one message.
 */
export interface ToastState {
  message: ToastMessage | null;

  // Actions
  /** Returns the new message id */
  showToast: (message: string, tone?: ToastTone) => string;
  clearToast: () => void;
}

export const useToastStore = create<ToastState>((set) => ({
  message: null,

  showToast: (message, tone) => {
    const toast = createToastMessage(message, tone);
    set({ message: toast });
    return toast.id;
  },

  clearToast: () => set({ message: null }),
}));

export const useToastMessage = () => useToastStore((s) => s.message);
