/**
 * ToastHost + MessageToastView tests
 */
import { render, screen, fireEvent, act } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";
import { ToastHost } from "../toast/ToastHost";
import { MessageToastView } from "../toast/MessageToastView";
import { createToastMessage } from "../toast/toastMessage";
import { useToastStore } from "../../../stores/toastStore";

describe("ToastHost", () => {
  beforeEach(() => {
    useToastStore.setState({ message: null });
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("renders its children with no toast by default", () => {
    render(
      <ToastHost>
        <p>Library</p>
      </ToastHost>
    );

    expect(screen.getByText("Library")).toBeInTheDocument();
    expect(screen.queryByTestId("toast")).not.toBeInTheDocument();
  });

  it("shows messages raised through the store", () => {
    render(<ToastHost />);

    act(() => {
      useToastStore.getState().showToast("Saved to library", "success");
    });

    expect(screen.getByText("Saved to library")).toBeInTheDocument();
    expect(
      screen.getByTestId("toast").querySelector("[data-toast-tone]")
    ).toHaveAttribute("data-toast-tone", "success");
  });

  it("clears the store slot after the preset timeout", () => {
    render(<ToastHost />);
    act(() => {
      useToastStore.getState().showToast("Saved to library");
    });

    act(() => {
      vi.advanceTimersByTime(2999);
    });
    expect(useToastStore.getState().message).not.toBeNull();

    act(() => {
      vi.advanceTimersByTime(1);
    });
    expect(useToastStore.getState().message).toBeNull();

    act(() => {
      vi.advanceTimersByTime(350);
    });
    expect(screen.queryByText("Saved to library")).not.toBeInTheDocument();
  });

  it("replaces the current message and restarts the timer", () => {
    const onDismiss = vi.fn();
    render(<ToastHost onDismiss={onDismiss} />);
    act(() => {
      useToastStore.getState().showToast("First");
    });
    act(() => {
      vi.advanceTimersByTime(2000);
    });

    act(() => {
      useToastStore.getState().showToast("Second", "warning");
    });
    expect(screen.getByText("Second")).toBeInTheDocument();
    expect(screen.queryByText("First")).not.toBeInTheDocument();

    act(() => {
      vi.advanceTimersByTime(2000);
    });
    expect(useToastStore.getState().message?.message).toBe("Second");
    expect(onDismiss).not.toHaveBeenCalled();

    act(() => {
      vi.advanceTimersByTime(1000);
    });
    expect(useToastStore.getState().message).toBeNull();
    expect(onDismiss).toHaveBeenCalledTimes(1);
    expect(onDismiss).toHaveBeenCalledWith("timeout");
  });

  it("clears the slot when the message is tapped", () => {
    render(<ToastHost />);
    act(() => {
      useToastStore.getState().showToast("Tap me");
    });

    fireEvent.click(screen.getByTestId("toast"));

    expect(useToastStore.getState().message).toBeNull();
  });
});

describe("MessageToastView", () => {
  it("renders the message with its tone", () => {
    const message = createToastMessage("Upload failed", "error");

    render(<MessageToastView message={message} onMessageChange={vi.fn()} />);

    expect(screen.getByText("Upload failed")).toBeInTheDocument();
    expect(
      screen.getByTestId("toast").querySelector("[data-toast-tone]")
    ).toHaveAttribute("data-toast-tone", "error");
  });

  it.each([
    ["success", "rgba(52, 199, 89, 0.3)"],
    ["error", "rgba(255, 59, 48, 0.3)"],
    ["warning", "rgba(255, 149, 0, 0.3)"],
    ["info", "rgba(0, 122, 255, 0.3)"],
  ] as const)("tints the %s capsule", (tone, background) => {
    render(
      <MessageToastView
        message={createToastMessage("Heads up", tone)}
        onMessageChange={vi.fn()}
      />
    );

    const capsule = screen.getByText("Heads up").parentElement;
    expect(capsule).toHaveAttribute("data-toast-tone", tone);
    expect(capsule).toHaveStyle({ backgroundColor: background });
  });

  it("asks the host to clear the message when tapped", async () => {
    const user = userEvent.setup();
    const onMessageChange = vi.fn();

    render(
      <MessageToastView
        message={createToastMessage("Copied")}
        onMessageChange={onMessageChange}
      />
    );
    await user.click(screen.getByText("Copied"));

    expect(onMessageChange).toHaveBeenCalledTimes(1);
    expect(onMessageChange).toHaveBeenCalledWith(null);
  });

  it("renders nothing over the host when there is no message", () => {
    render(
      <MessageToastView message={null} onMessageChange={vi.fn()}>
        <p>Host</p>
      </MessageToastView>
    );

    expect(screen.getByText("Host")).toBeInTheDocument();
    expect(screen.queryByTestId("toast")).not.toBeInTheDocument();
  });
});
