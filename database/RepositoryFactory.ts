/**
 * Repository Factory
 * Provides centralized access to all repositories with a shared pg Pool
 */

import { Pool } from 'pg';
import { AccountRepository } from './repositories/AccountRepository';
import { TradeRepository } from './repositories/TradeRepository';
import { LoggerFactory } from '../logging/logger';

const logger = LoggerFactory.getLogger('RepositoryFactory');

export class RepositoryFactory {
  private pool: Pool;
  private accountRepo?: AccountRepository;
  private tradeRepo?: TradeRepository;

  constructor(connectionStringOrPool?: string | Pool) {
    if (connectionStringOrPool instanceof Pool) {
      this.pool = connectionStringOrPool;
    } else {
      // Create PostgreSQL connection pool
      this.pool = new Pool({
        connectionString: connectionStringOrPool ?? process.env.DATABASE_URL,
      });
    }
    this.pool.on('error', (error) => {
      logger.error('Idle PostgreSQL client error', error);
    });
  }

  /**
   * Get Account Repository instance (singleton per factory)
   */
  getAccountRepo(): AccountRepository {
    if (!this.accountRepo) {
      this.accountRepo = new AccountRepository(this.pool);
    }
    return this.accountRepo;
  }

  /**
   * Get Trade Repository instance (singleton per factory)
   */
  getTradeRepo(): TradeRepository {
    if (!this.tradeRepo) {
      this.tradeRepo = new TradeRepository(this.pool);
    }
    return this.tradeRepo;
  }

  /**
   * Get the PostgreSQL connection pool
   */
  getPool(): Pool {
    return this.pool;
  }

  /**
   * Close the pool
   */
  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Check database connection
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.error('Database health check failed', error);
      return false;
    }
  }
}
