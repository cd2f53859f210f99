import type { ToastMessage, ToastTone } from "./types";

let toastIdCounter = 0;
const generateId = () => `toast-${++toastIdCounter}`;

export function createToastMessage(
  message: string,
  tone: ToastTone = "info"
): ToastMessage {
  return { id: generateId(), message, tone };
}
