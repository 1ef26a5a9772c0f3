// @vitest-environment jsdom
import { act } from "react";
import { createRoot, type Root } from "react-dom/client";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Graph } from "../lib/graph";
import { GraphCanvas } from "./GraphCanvas";

Reflect.set(globalThis, "IS_REACT_ACT_ENVIRONMENT", true);

describe("GraphCanvas", () => {
  let container: HTMLDivElement;
  let root: Root;

  beforeEach(() => {
    container = document.createElement("div");
    document.body.appendChild(container);
    root = createRoot(container);
  });

  afterEach(() => {
    act(() => {
      root.unmount();
    });
    container.remove();
  });

  it("renders a labelled canvas of the requested size", () => {
    const graph = new Graph<string, string>();
    graph.addNode("a", { location: { x: 0, y: 0 } });

    act(() => {
      root.render(
        <GraphCanvas graph={graph} width={300} height={200} ariaLabel="Dependency graph" />,
      );
    });

    const canvas = container.querySelector("canvas");
    expect(canvas?.getAttribute("aria-label")).toBe("Dependency graph");
    expect(canvas?.getAttribute("role")).toBe("application");
    expect(canvas?.width).toBe(300);
    expect(canvas?.height).toBe(200);
  });

  it("renders the controls overlay beside the canvas", () => {
    act(() => {
      root.render(
        <GraphCanvas
          graph={new Graph<string, string>()}
          width={100}
          height={100}
          controlsOverlay={<button type="button">Fit</button>}
        />,
      );
    });

    expect(container.querySelector(".graph-canvas-controls button")?.textContent).toBe("Fit");
    expect(container.querySelector("canvas")?.getAttribute("aria-label")).toBe("Graph view");
  });
});
