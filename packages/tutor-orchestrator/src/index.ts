/**
 * @studyhall/tutor-orchestrator
 * Intent classification and the Supervisor
 */

export {
  Supervisor,
  createRequestId,
  mergePayloads,
  type HandleOptions,
  type SupervisorOptions,
  type SupervisorStats,
} from './supervisor/supervisor.js';
export { routeFor, selectSpecialist, type StepSelection } from './supervisor/routes.js';
export { IntentClassifier, DEFAULT_INTENT, type IntentClassifierOptions } from './classifier/intent-classifier.js';
export { DEFAULT_INTENT_RULES, type IntentRule } from './classifier/rules.js';
export { toQuery, toProfile, toWireResponse, toErrorEnvelope, isErrorEnvelope } from './boundary/wire.js';
