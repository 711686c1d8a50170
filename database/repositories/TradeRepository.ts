/**
 * Trade Repository
 * Mirrors broker-side protection levels onto local trade rows
 */

import { Pool } from 'pg';
import { LoggerFactory } from '../../logging/logger';
import type { ProtectionLevels } from '../../connectors/ctrader/ProtectionAmendTask';
import type { TradeProtectionStore } from '../../connectors/ctrader/CTraderHttpConnector';

const logger = LoggerFactory.getLogger('TradeRepository');

export class TradeRepository implements TradeProtectionStore {
  constructor(private pool: Pool) {}

  /**
   * Update stop loss / profit target for the account's trade with this position id.
   * Only the provided levels are written.
   *
   * @returns Number of rows updated (0 when the trade row does not exist yet)
   */
  async updateProtection(accountId: string, positionId: string, levels: ProtectionLevels): Promise<number> {
    const sets: string[] = [];
    const values: Array<string | number> = [accountId, positionId];

    if (levels.stopLoss !== undefined) {
      values.push(levels.stopLoss);
      sets.push(`stop_loss = $${values.length}`);
    }
    if (levels.takeProfit !== undefined) {
      values.push(levels.takeProfit);
      sets.push(`profit_target = $${values.length}`);
    }
    if (sets.length === 0) {
      return 0;
    }

    const result = await this.pool.query(
      `UPDATE trades SET ${sets.join(', ')} WHERE account_id = $1 AND position_id = $2`,
      values
    );
    const updated = result.rowCount ?? 0;
    logger.debug(`[TradeRepository] Updated protection on ${updated} row(s)`, { accountId, positionId, ...levels });
    return updated;
  }
}
