/**
 * INSPECTION SERVICE (Aggregator)
 */

export * from './inspection/statusRules';
export * from './inspection/inspectionSession';
export * from './inspection/simulationDriver';
