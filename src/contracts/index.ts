export type {
  VideoRef,
  SheetConfig,
  Duration,
  ProbeError,
  ProbeOutcome,
  SheetPlan,
  PlanError,
  PlanOutcome,
  TimestampLabel,
  TileGeometry,
  FilterGraph,
  RenderRequest,
  RenderError,
  RenderOutcome,
  ToolPaths,
  ToolNotFound,
  SheetStage,
  SheetFailure,
  SheetResult,
} from "./types";
