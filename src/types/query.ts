import type { LoginSetDescriptor } from './login'

/**
 * A membership query with its ground truth.
 */
export interface Query {
  username: string
  /** Whether the username is a member of the paired login set */
  present: boolean
}

/**
 * Ordered queries generated against one login set.
 */
export interface QuerySet {
  /** Target fraction of present queries; the realised fraction is only approximate */
  dupRate: number
  logins: LoginSetDescriptor
  queries: readonly Query[]
}

/**
 * Counts of a query set by ground truth.
 */
export interface QuerySummary {
  total: number
  present: number
  absent: number
  presentFraction: number
}
