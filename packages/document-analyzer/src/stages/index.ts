export { HolisticAssessor } from './holistic-assessor';
export { UnitEvaluator } from './unit-evaluator';
export { UnitIdentifier } from './unit-identifier';
