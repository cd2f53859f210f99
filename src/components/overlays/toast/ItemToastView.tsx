import { useRef, type ReactNode } from "react";
import { ToastView, type ToastViewProps } from "./ToastView";

export interface ItemToastViewProps<T extends { id: string }>
  extends Omit<
    ToastViewProps,
    "isPresented" | "onIsPresentedChange" | "content" | "triggerKey"
  > {
  /** Presented while non-null */
  item: T | null;
  /** Receives `null` when the toast closes itself */
  onItemChange: (item: null) => void;
  content: (item: T) => ReactNode;
}

/**
 * Toast bound to an optional item instead of a boolean.
 *
 * Supplying a different item (by id) while one is showing restarts the
 * timer. The last item keeps rendering while the exit transition runs.
 */
export function ItemToastView<T extends { id: string }>({
  item,
  onItemChange,
  content,
  ...rest
}: ItemToastViewProps<T>) {
  const lastItemRef = useRef<T | null>(item);
  if (item !== null) {
    lastItemRef.current = item;
  }

  const renderContent = () => {
    const current = item ?? lastItemRef.current;
    return current === null ? null : content(current);
  };

  return (
    <ToastView
      {...rest}
      isPresented={item !== null}
      onIsPresentedChange={() => onItemChange(null)}
      triggerKey={item?.id}
      content={renderContent}
    />
  );
}
