// Compliance sanitizer exports

export type { CanvasLimits, CompliancePolicy, CanvasSize } from './types'

export type { CompliancePolicyInput } from './policy'
export {
  CompliancePolicySchema,
  createCompliancePolicy,
  DEFAULT_COMPLIANCE_POLICY,
} from './policy'

export { parseLengthWithUnit, lengthToPixels } from './unitConversion'
export {
  isTagAllowed,
  isAttributeAllowed,
  isValueSafe,
  sanitizeTree,
  sanitizeDocument,
  findViolation,
} from './sanitize'
export { checkCanvas } from './canvas'
export type { EnsureComplianceOptions } from './ensureCompliance'
export { ensureCompliance, isCompliant } from './ensureCompliance'
