export { FileWindowSink, windowFileName, defaultFileWindowSinkOptions } from "./FileWindowSink";
export type { FileWindowSinkOptions } from "./FileWindowSink";
export { FeatureSampleSchema, loadDataset, toFeatureTensor, windowFileSchema } from "./dataset";
export type { Dataset, DatasetEntry, LoadDatasetOptions } from "./dataset";
export { classReports, evaluateClassifier } from "./evaluate";
export type { ClassReport, EvaluationReport } from "./evaluate";
