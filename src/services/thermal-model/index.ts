/**
 * Thermal Model Module
 *
 * Per-zone (or per-group) learned thermal response used by the scheduler.
 */

export * from './data-collector';
export * from './thermal-model';
export * from './thermal-model-service';
