export const CHART_VISUALIZATION_VERSION = "chart_visualization_v1" as const;

export const CHART_TYPES = [
  "bar",
  "line",
  "area",
  "scatter",
  "dual_axis",
  "pie",
  "funnel",
  "radar",
  "word_cloud",
] as const;

export type ChartType = (typeof CHART_TYPES)[number];

export const INSIGHT_CHART_TYPES: readonly ChartType[] = ["bar", "line", "area", "scatter", "dual_axis"];

export const ALGORITHM_TYPES = [
  "overallTrend",
  "abnormalTrend",
  "pearsonCorrelation",
  "spearmanCorrelation",
  "statisticsAbnormal",
  "lofOutlier",
  "dbscanOutlier",
  "majorityValue",
  "extremeValue",
  "pageHinkley",
  "turningPoint",
  "differenceOutlier",
  "statisticsBase",
  "volatility",
] as const;

export type AlgorithmType = (typeof ALGORITHM_TYPES)[number];

export const LANGUAGES = ["en", "zh"] as const;
export type Language = (typeof LANGUAGES)[number];

export const OUTPUT_TYPES = ["png", "html"] as const;
export type OutputType = (typeof OUTPUT_TYPES)[number];

export type ArtifactExtension = OutputType | "json" | "md";

export type ChartTheme = "light" | "dark";

export type Scalar = string | number | boolean | null;
export type DataRow = Record<string, Scalar>;

export type FieldType = "quantitative" | "temporal" | "nominal";
export type FieldInfo = { name: string; type: FieldType };

export type ChartFormatter = (value: Scalar, datum?: DataRow) => string;

export type InsightTarget =
  | { kind: "point"; x: Scalar; y: number; series?: string; measure?: string }
  | {
      kind: "line";
      from: { x: Scalar; y: number };
      to: { x: Scalar; y: number };
      series?: string;
      measure?: string;
    }
  | { kind: "vertical"; x: Scalar }
  | { kind: "note" };

export type InsightRecord = {
  id: number;
  type: AlgorithmType;
  content: string;
  evidence?: Record<string, number>;
  target?: InsightTarget;
};

export type ChartAnnotation = InsightTarget & {
  insight_id: number;
  text: string;
};

export type ChartAxis = {
  orient: "left" | "right" | "bottom";
  field?: string;
  title?: string;
  label?: { formatter?: ChartFormatter };
};

export type ChartSpec = {
  type: ChartType;
  data: { id: string; values: DataRow[] };
  xField: string;
  yField: string;
  seriesField?: string;
  y2Field?: string;
  title?: { text: string };
  theme: ChartTheme;
  width?: number;
  height?: number;
  animation?: boolean;
  label?: { visible: boolean; formatter?: ChartFormatter };
  tooltip?: { formatter?: ChartFormatter };
  axes?: ChartAxis[];
  insights?: InsightRecord[];
  annotations?: ChartAnnotation[];
};

export type LlmConfig = {
  base_url: string;
  model: string;
  api_key: string;
};

export type TableDataset = {
  columns: string[];
  rows: Scalar[][];
};

export type DatasetInput = DataRow[] | TableDataset | string;

/** Only these two are routed; any other task answers with an empty result. */
export type TaskType = "visualization" | "insight" | (string & {});

export type ChartRequest = {
  llm_config?: LlmConfig;
  width?: number;
  height?: number;
  dataset: readonly DataRow[];
  directory: string;
  user_prompt?: string;
  output_type: OutputType;
  file_name: string;
  task_type: TaskType;
  insights_id: number[];
  language: Language;
};

export type ChartResult = {
  chart_path?: string;
  error?: string;
  error_code?: string;
  insight_path?: string;
  insight_md?: string;
};

export function isChartType(value: unknown): value is ChartType {
  return typeof value === "string" && CHART_TYPES.some((type) => type === value);
}

export function isAlgorithmType(value: unknown): value is AlgorithmType {
  return typeof value === "string" && ALGORITHM_TYPES.some((type) => type === value);
}

export function isInsightEligible(type: ChartType): boolean {
  return INSIGHT_CHART_TYPES.includes(type);
}
