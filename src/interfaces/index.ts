export type { PipelineServiceClient } from "./clients/pipelineServiceClient";
