export { SavePipeline } from './save-pipeline';
export type { SaveMode } from './save-pipeline';
export { LoadPipeline } from './load-pipeline';
export { PreparedRecord } from './prepared-record';
export type { PendingReference } from './prepared-record';
export { InFlightRegistry } from './in-flight-registry';
export type { PipelineContext } from './pipeline-context';
