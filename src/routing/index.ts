/**
 * Routing facade — backend registry, gateway adapter, workspaces and intent.
 */
export { BackendRegistry, estimateTokens, promptTokenBound, getApiKey, envKeyName } from './models.js';
export { HttpModelGateway } from './providers.js';
export { ConfigWorkspaceDirectory, DEFAULT_WORKSPACE, type WorkspaceDirectory } from './workspaces.js';
export {
  IntentClassifier, classifyByRules, parseClassification, workflowFor, countWords,
  type IntentClassifierDeps, type RuleMatch,
} from './classifier.js';
