export { evaluateAgentResponse } from './agent-response.js';
export { evaluateNetworkEvents, parseRequestBody } from './network-event.js';
export { runEvaluator, evaluatorResult, errorResult, type EvaluationContext } from './base.js';
