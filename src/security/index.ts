/**
 * @fileoverview Security module exports
 *
 * Tenant credential validation and the HTTP gate that binds a credential to
 * each tool request.
 *
 * @packageDocumentation
 */

export {
  CREDENTIAL_HEADER,
  ACCEPTED_CREDENTIAL_SCHEMES,
  checkCredential,
  validateCredential,
  redactCredential,
  describeAcceptedSchemes,
  hasAcceptedScheme,
  tenantIdFor,
  type TenantCredential,
  type CredentialCheck,
} from './credentials.js';

export {
  TenantGate,
  TenantRequestContext,
  evaluateTenantRequest,
  buildGateErrorFrame,
  gateErrorMessage,
  normalizeHeaders,
  parseBearerToken,
  stripAuthorization,
  GATE_ERROR_STATUS,
  GATE_ERROR_CODE,
  GATE_ERROR_HEADERS,
  type GateRequest,
  type GateResponse,
  type GateNext,
  type GateDecision,
  type CredentialSource,
  type TenantGateOptions,
} from './tenant_gate.js';
