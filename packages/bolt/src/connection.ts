/**
 * Bolt Connection
 *
 * Manages the driver for a Bolt-compatible server (Neo4j, Memgraph) and hands
 * out sessions. The driver is loaded on first use.
 */

import { toError } from "@graphcheck/harness"
import type { Driver, Session, Transaction } from "neo4j-driver"
import type { BoltConfig } from "./config"
import { BoltConnectionError } from "./errors"
import type { CypherParams, CypherRecord, CypherSession, CypherTransaction, SessionFactory } from "./session"

class DriverTransaction implements CypherTransaction {
  constructor(private readonly transaction: Transaction) {}

  async run(query: string, params: CypherParams = {}): Promise<CypherRecord[]> {
    const result = await this.transaction.run(query, params)
    return result.records.map((record) => record.toObject())
  }

  commit(): Promise<void> {
    return this.transaction.commit()
  }

  rollback(): Promise<void> {
    return this.transaction.rollback()
  }

  isOpen(): boolean {
    return this.transaction.isOpen()
  }
}

class DriverSession implements CypherSession {
  constructor(private readonly session: Session) {}

  async run(query: string, params: CypherParams = {}): Promise<CypherRecord[]> {
    const result = await this.session.run(query, params)
    return result.records.map((record) => record.toObject())
  }

  beginTransaction(): CypherTransaction {
    return new DriverTransaction(this.session.beginTransaction())
  }

  close(): Promise<void> {
    return this.session.close()
  }
}

export class BoltConnection implements SessionFactory {
  private driver: Driver | null = null

  constructor(private readonly config: BoltConfig) {}

  async connect(): Promise<Driver> {
    if (this.driver) return this.driver

    let neo4j: typeof import("neo4j-driver")
    try {
      neo4j = await import("neo4j-driver")
    } catch (error) {
      throw new BoltConnectionError(
        "neo4j-driver is required for Bolt connections. Install it with: npm install neo4j-driver",
        this.config.uri,
        toError(error),
      )
    }

    const { username, password = "", pool } = this.config
    const auth = username ? neo4j.auth.basic(username, password) : undefined
    const driver = neo4j.driver(this.config.uri, auth, {
      maxConnectionPoolSize: pool?.maxSize,
      connectionAcquisitionTimeout: pool?.acquisitionTimeout,
    })

    try {
      await driver.verifyConnectivity()
    } catch (error) {
      await driver.close()
      throw new BoltConnectionError(`Cannot reach ${this.config.uri}`, this.config.uri, toError(error))
    }

    this.driver = driver
    return driver
  }

  async openSession(database = this.config.database): Promise<CypherSession> {
    const driver = await this.connect()
    return new DriverSession(driver.session({ database }))
  }

  async close(): Promise<void> {
    if (this.driver) {
      await this.driver.close()
      this.driver = null
    }
  }

  isConnected(): boolean {
    return this.driver !== null
  }
}
