export {
  PipelineMonitorError,
  RateLimitedError,
  RetriesExhaustedError,
  RemoteFailureError,
  JobFailedError,
  AssetCaptureFailedError,
  NameResolutionError,
  RunAbortedError,
  SettingsValidationError,
} from "./pipelineErrors";
