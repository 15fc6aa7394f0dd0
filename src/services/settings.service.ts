import { query } from '../config/database';
import { logger } from '../utils/logger';

const ACTIVE_FORWARDER_ID = 'active';

/** Persists the active forwarder's encoded configuration blob. */
export class SettingsService {
  async getForwarderConfig(): Promise<string | null> {
    const result = await query('SELECT config FROM forwarder_settings WHERE id = $1', [ACTIVE_FORWARDER_ID]);
    const row: { config?: unknown } | undefined = result.rows[0];
    return typeof row?.config === 'string' ? row.config : null;
  }

  async saveForwarderConfig(config: string): Promise<void> {
    await query(
      `INSERT INTO forwarder_settings (id, config, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (id) DO UPDATE SET config = EXCLUDED.config, updated_at = NOW()`,
      [ACTIVE_FORWARDER_ID, config]
    );
    logger.debug('Forwarder config saved');
  }

  async deleteForwarderConfig(): Promise<void> {
    await query('DELETE FROM forwarder_settings WHERE id = $1', [ACTIVE_FORWARDER_ID]);
    logger.debug('Forwarder config deleted');
  }
}
