// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createRoot, type Root } from "react-dom/client";
import { act } from "react";
import PathfindingVisualizer from "./App";

// default board: 20x30 cells of 24px
describe("PathfindingVisualizer", () => {
  let container: HTMLDivElement;
  let root: Root;

  beforeEach(() => {
    container = document.createElement("div");
    document.body.appendChild(container);
    root = createRoot(container);
    act(() => root.render(<PathfindingVisualizer />));
  });

  afterEach(() => {
    act(() => root.unmount());
    container.remove();
  });

  const text = (testId: string) =>
    container.querySelector(`[data-testid="${testId}"]`)?.textContent;

  const canvas = () => {
    const cvs = container.querySelector("canvas");
    if (!cvs) throw new Error("canvas not rendered");
    return cvs;
  };

  const button = (label: string) => {
    const found = Array.from(container.querySelectorAll("button")).find(
      (b) => b.textContent === label
    );
    if (!found) throw new Error(`no ${label} button`);
    return found;
  };

  const press = (x: number, y: number, mouseButton = 0) =>
    act(() => {
      canvas().dispatchEvent(
        new MouseEvent("mousedown", { bubbles: true, clientX: x, clientY: y, button: mouseButton })
      );
      canvas().dispatchEvent(new MouseEvent("mouseup", { bubbles: true }));
    });

  const field = (id: string) => {
    const input = container.querySelector<HTMLInputElement>(`#${id}`);
    if (!input) throw new Error(`no #${id} field`);
    return input;
  };

  // goes through the native setter so React sees the edit
  const typeInto = (input: HTMLInputElement, value: string) =>
    act(() => {
      Object.getOwnPropertyDescriptor(HTMLInputElement.prototype, "value")?.set?.call(input, value);
      input.dispatchEvent(new Event("input", { bubbles: true }));
    });

  it("starts idle with nothing placed", () => {
    expect(container.querySelector("h1")?.textContent).toBe("Pathfinding Visualizer");
    expect(text("status")).toBe("Idle");
    expect(text("endpoints")).toBe("Start: — · End: —");
    expect(canvas().width).toBe(720);
    expect(canvas().height).toBe(480);
  });

  it("places the start, then the end", () => {
    press(5, 5);
    expect(text("endpoints")).toBe("Start: (0,0) · End: —");
    press(53, 30);
    expect(text("endpoints")).toBe("Start: (0,0) · End: (1,2)");
  });

  it("erases with the right button", () => {
    press(5, 5);
    press(53, 30);
    press(53, 30, 2);
    expect(text("endpoints")).toBe("Start: (0,0) · End: —");
  });

  it("refuses to run without endpoints", () => {
    act(() => button("Run").click());
    expect(container.querySelector('[role="alert"]')?.textContent).toBe(
      "no start cell has been set"
    );
    expect(text("status")).toBe("Idle");
  });

  it("clears the grid on C", () => {
    press(5, 5);
    press(53, 30);
    act(() => {
      window.dispatchEvent(new KeyboardEvent("keydown", { key: "c" }));
    });
    expect(text("endpoints")).toBe("Start: — · End: —");
  });

  it("resizes only once the size field is committed", () => {
    typeInto(field("rows"), "1");
    typeInto(field("rows"), "15");
    expect(canvas().height).toBe(480);

    act(() => {
      field("rows").dispatchEvent(new FocusEvent("focusout", { bubbles: true }));
    });
    expect(field("rows").value).toBe("15");
    expect(canvas().height).toBe(360);
    expect(canvas().width).toBe(720);
  });

  it("clamps the size on Enter", () => {
    typeInto(field("cols"), "300");
    act(() => {
      field("cols").dispatchEvent(new KeyboardEvent("keydown", { bubbles: true, key: "Enter" }));
    });
    // 200 columns at the 4px minimum
    expect(field("cols").value).toBe("200");
    expect(canvas().width).toBe(800);
    expect(canvas().height).toBe(80);
  });
});
