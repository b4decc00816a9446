export { PipelineMonitorJob, runJob } from "./pipelineMonitorJob";
