/**
 * Cypher Session Contract
 *
 * The slice of a Bolt session the backend uses. BoltConnection adapts
 * neo4j-driver sessions to it.
 */

import type { Awaitable } from "@graphcheck/harness"

export type CypherParams = Record<string, unknown>

/** One result row, keyed by the names in the RETURN clause */
export type CypherRecord = Readonly<Record<string, unknown>>

export interface CypherTransaction {
  run(query: string, params?: CypherParams): Promise<CypherRecord[]>
  commit(): Promise<void>
  rollback(): Promise<void>
  isOpen(): boolean
}

export interface CypherSession {
  /** Run a statement in its own auto-commit transaction */
  run(query: string, params?: CypherParams): Promise<CypherRecord[]>
  beginTransaction(): CypherTransaction
  close(): Promise<void>
}

export interface SessionFactory {
  openSession(database?: string): Awaitable<CypherSession>
  close?(): Awaitable<void>
}
