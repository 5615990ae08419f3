// Sanitize + optimize orchestration

import { ComplianceError, MalformedDocumentError } from '../errors'
import { optimizeDocument } from '../svgOptimizer'
import type { OptimizeOptions } from '../svgOptimizer'
import { parseDocument, serializeElement } from '../svgSerializer'
import { checkCanvas } from './canvas'
import { DEFAULT_COMPLIANCE_POLICY } from './policy'
import { findViolation, sanitizeTree } from './sanitize'
import type { CompliancePolicy } from './types'

export interface EnsureComplianceOptions extends OptimizeOptions {
  policy?: CompliancePolicy
}

/**
 * Make a document legal and small. Disallowed content is stripped and the
 * result shrunk towards the budget; a budget miss is returned as the best
 * effort. Anything that still breaks the policy afterwards raises
 * ComplianceError, since non-compliant output is never emitted.
 */
export function ensureCompliance(
  document: string,
  maxSizeKb: number,
  options: EnsureComplianceOptions = {}
): string {
  const { policy = DEFAULT_COMPLIANCE_POLICY, ...optimizeOptions } = options

  const sanitized = sanitizeTree(parseDocument(document), policy)
  checkCanvas(sanitized, policy)

  const outcome = optimizeDocument(serializeElement(sanitized), maxSizeKb, optimizeOptions)

  const result = parseDocument(outcome.document)
  checkCanvas(result, policy)
  const violation = findViolation(result, policy)
  if (violation) {
    throw new ComplianceError('allowlist', `${violation} survived sanitizing`)
  }

  return outcome.document
}

/**
 * Boolean form of the policy check: allowlist, namespace and canvas.
 * Malformed markup is simply not compliant.
 */
export function isCompliant(document: string, policy: CompliancePolicy = DEFAULT_COMPLIANCE_POLICY): boolean {
  try {
    const root = parseDocument(document)
    if (root.tag !== 'svg' || root.attributes.get('xmlns') !== policy.namespace) return false
    checkCanvas(root, policy)
    return findViolation(root, policy) === null
  } catch (error) {
    if (error instanceof ComplianceError || error instanceof MalformedDocumentError) {
      return false
    }
    throw error
  }
}
