export { CostMonitor, DEFAULT_COST_OPTIONS, windowStats, type CostMonitorOptions, type WindowStats } from './monitor.js';
