import { describe, it, expect } from "vitest";
import * as path from "path";
import {
  buildFilterGraph,
  buildRenderArgs,
  buildRenderRequest,
  FilterValueError,
  formatDecimal,
  serializeFilterGraph,
} from "../../src/pipeline/filter";
import type { FilterGraph, SheetPlan } from "../../src/contracts";

const CONFIG = { interval: 30, columns: 5, thumbHeight: 250 };
const PLAN: SheetPlan = { thumbnailCount: 20, columns: 5, rows: 4 };

const EXPECTED_FILTER =
  "fps=1/30," +
  "scale=-1:250," +
  "drawtext=text='%{pts\\:hms}':x=10:y=10:fontsize=24:fontcolor=white@0.8:" +
  "box=1:boxcolor=black@0.5:boxborderw=5," +
  "tile=layout=5x4:padding=10:margin=10";

describe("buildFilterGraph", () => {
  it("carries plan geometry and config into structured fields", () => {
    const graph = buildFilterGraph(PLAN, CONFIG);
    expect(graph.sampleInterval).toBe(30);
    expect(graph.scaleHeight).toBe(250);
    expect(graph.tile).toEqual({ columns: 5, rows: 4, padding: 10, margin: 10 });
    expect(graph.label).toEqual({
      text: "%{pts\\:hms}",
      x: 10,
      y: 10,
      fontSize: 24,
      fontColor: "white@0.8",
      boxColor: "black@0.5",
      boxBorderWidth: 5,
    });
  });
});

describe("serializeFilterGraph", () => {
  it("produces the sample -> scale -> label -> tile chain", () => {
    expect(serializeFilterGraph(buildFilterGraph(PLAN, CONFIG))).toBe(EXPECTED_FILTER);
  });

  it("writes fractional intervals as plain decimals", () => {
    const graph = buildFilterGraph(PLAN, { ...CONFIG, interval: 2.5 });
    expect(serializeFilterGraph(graph).startsWith("fps=1/2.5,")).toBe(true);
  });

  it("re-checks tile geometry", () => {
    const graph: FilterGraph = {
      ...buildFilterGraph(PLAN, CONFIG),
      tile: { columns: 5, rows: 0, padding: 10, margin: 10 },
    };
    expect(() => serializeFilterGraph(graph)).toThrow(FilterValueError);
  });

  it("re-checks scale height", () => {
    const graph: FilterGraph = { ...buildFilterGraph(PLAN, CONFIG), scaleHeight: 12.5 };
    expect(() => serializeFilterGraph(graph)).toThrow("Scale height must be a positive integer (got 12.5)");
  });

  it("re-checks the sample interval", () => {
    const graph: FilterGraph = { ...buildFilterGraph(PLAN, CONFIG), sampleInterval: NaN };
    expect(() => serializeFilterGraph(graph)).toThrow(FilterValueError);
  });
});

describe("formatDecimal", () => {
  it("keeps ordinary numbers as they print", () => {
    expect(formatDecimal(30, "x")).toBe("30");
    expect(formatDecimal(0.5, "x")).toBe("0.5");
  });

  it("expands exponent notation", () => {
    const text = formatDecimal(1e-7, "x");
    expect(text).toMatch(/^0\.\d+$/);
    expect(text).not.toContain("e");
  });

  it("rejects zero, negatives and huge values", () => {
    expect(() => formatDecimal(0, "x")).toThrow(FilterValueError);
    expect(() => formatDecimal(-1, "x")).toThrow(FilterValueError);
    expect(() => formatDecimal(1e21, "x")).toThrow("x is too large (got 1e+21)");
  });
});

describe("buildRenderArgs", () => {
  it("emits one quality-biased JPEG frame and overwrites", () => {
    expect(buildRenderArgs("/v/a.mp4", "FILTER", "/v/a_contact.jpg")).toEqual([
      "-loglevel",
      "warning",
      "-i",
      "/v/a.mp4",
      "-vf",
      "FILTER",
      "-frames:v",
      "1",
      "-q:v",
      "3",
      "-y",
      "/v/a_contact.jpg",
    ]);
  });
});

describe("buildRenderRequest", () => {
  it("combines plan, config and paths into a frozen request", () => {
    const request = buildRenderRequest(PLAN, CONFIG, "/videos/a.mp4", "/sheets/a.jpg");

    expect(request.video).toBe(path.resolve("/videos/a.mp4"));
    expect(request.outputPath).toBe(path.resolve("/sheets/a.jpg"));
    expect(request.plan).toEqual(PLAN);
    expect(request.config).toEqual(CONFIG);
    expect(request.args).toEqual(
      buildRenderArgs(path.resolve("/videos/a.mp4"), EXPECTED_FILTER, path.resolve("/sheets/a.jpg"))
    );
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.args)).toBe(true);
    expect(Object.isFrozen(request.config)).toBe(true);
  });

  it("makes relative paths absolute so they cannot read as options", () => {
    const request = buildRenderRequest(PLAN, CONFIG, "-weird.mp4", "out.jpg");
    expect(request.video).toBe(path.resolve("-weird.mp4"));
    expect(path.isAbsolute(request.args[3])).toBe(true);
    expect(path.isAbsolute(request.args[request.args.length - 1])).toBe(true);
  });

  it("keeps file names out of the filter string", () => {
    const request = buildRenderRequest(PLAN, CONFIG, "/videos/x',drawtext=text=pwn.mp4", "/o.jpg");
    expect(request.args[5]).toBe(EXPECTED_FILTER);
  });

  it("copies config so later mutation does not leak in", () => {
    const config = { ...CONFIG };
    const request = buildRenderRequest(PLAN, config, "/videos/a.mp4", "/o.jpg");
    config.columns = 9;
    expect(request.config.columns).toBe(5);
  });
});
