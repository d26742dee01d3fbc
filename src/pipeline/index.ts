export { GovernancePipeline, type GovernedResponse, type PendingAudit, type PipelineDeps, type ProcessOptions } from './pipeline.js';
