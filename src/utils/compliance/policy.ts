// Allowlist policy loading

import { z } from 'zod'
import policyTable from '../../config/compliancePolicy.json'
import { InvalidOptionError } from '../errors'
import type { CompliancePolicy } from './types'

const AttributeNames = z.array(z.string().min(1))

export const CompliancePolicySchema = z.object({
  namespace: z.string().min(1),
  canvas: z
    .object({
      minWidth: z.number().positive(),
      maxWidth: z.number().positive(),
      minHeight: z.number().positive(),
      maxHeight: z.number().positive(),
    })
    .refine(c => c.minWidth <= c.maxWidth && c.minHeight <= c.maxHeight, {
      message: 'canvas minimum exceeds maximum',
    }),
  globalAttributes: AttributeNames,
  tags: z.record(z.string().min(1), AttributeNames).refine(tags => 'svg' in tags, {
    message: 'the svg root tag must be allowed',
  }),
})

export type CompliancePolicyInput = z.infer<typeof CompliancePolicySchema>

/**
 * Validate a policy table and resolve it into lookup sets
 */
export function createCompliancePolicy(input: unknown): CompliancePolicy {
  const parsed = CompliancePolicySchema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidOptionError(`Invalid compliance policy: ${parsed.error.message}`, {
      cause: parsed.error,
    })
  }

  const { namespace, canvas, globalAttributes, tags } = parsed.data
  const tagMap = new Map<string, ReadonlySet<string>>()
  for (const [tag, attributes] of Object.entries(tags)) {
    tagMap.set(tag, new Set(attributes))
  }

  return Object.freeze({
    namespace,
    canvas: Object.freeze({ ...canvas }),
    globalAttributes: new Set(globalAttributes),
    tags: tagMap,
  })
}

export const DEFAULT_COMPLIANCE_POLICY = createCompliancePolicy(policyTable)
