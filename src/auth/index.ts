export {
  createAuthorizationGate,
  type AuthorizationGate,
  type AuthorizationGateOptions,
  type AuthorizationDecision,
  type DenyReason,
} from './authorization-gate.js'
