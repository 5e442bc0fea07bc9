/**
 * Adapter that drives any {@link MembershipStructure}
 * @module adapters/structure-adapter
 */

import type { LoginSource } from '../types/login'
import type { QuerySet } from '../types/query'
import type { ConfusionOutcome, MembershipKind } from '../types/outcome'
import type {
  MembershipAdapter,
  StructureFactory,
} from './types'

/**
 * Builds an adapter that inserts every login into a fresh structure, probes
 * every query, and tallies the answers against ground truth. The elapsed
 * time covers both build and probe.
 *
 * @example
 * ```typescript
 * const exact = createStructureAdapter('exact', 'hash-set', () => new Set<string>())
 * const outcome = exact.evaluate(logins, queries)
 * ```
 */
export function createStructureAdapter(
  kind: MembershipKind,
  name: string,
  factory: StructureFactory
): MembershipAdapter {
  return {
    kind,
    name,
    evaluate(logins: LoginSource, querySet: QuerySet): ConfusionOutcome {
      const startTime = performance.now()

      const structure = factory(logins.size)
      for (const username of logins) {
        structure.add(username)
      }

      let truePositives = 0
      let trueNegatives = 0
      let falsePositives = 0
      let falseNegatives = 0

      for (const query of querySet.queries) {
        const reported = structure.has(query.username)
        if (query.present) {
          if (reported) truePositives++
          else falseNegatives++
        } else if (reported) {
          falsePositives++
        } else {
          trueNegatives++
        }
      }

      return {
        elapsedMs: performance.now() - startTime,
        truePositives,
        trueNegatives,
        falsePositives,
        falseNegatives,
      }
    },
  }
}
