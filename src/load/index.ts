export { LoadOrchestrator, type LoadTarget, type LoadResult } from './orchestrator.js';
