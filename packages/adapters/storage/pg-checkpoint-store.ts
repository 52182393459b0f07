/**
 * PgCheckpointStore - Shard resume cursors in PostgreSQL
 *
 * @module packages/adapters/storage/pg-checkpoint-store
 */

import type postgres from 'postgres';
import type { WorkCursor } from '@silvermerge/core/domain';
import type { ICheckpointStore } from '@silvermerge/core/ports';

export class PgCheckpointStore implements ICheckpointStore {
  constructor(private readonly sql: postgres.Sql) {}

  async load(shardKey: string): Promise<WorkCursor | null> {
    const rows = await this.sql<WorkCursor[]>`
      SELECT table_name AS "tableName", tenant_id AS "tenantId"
      FROM consolidation_checkpoints
      WHERE shard_key = ${shardKey}
    `;
    if (rows.length === 0) {
      return null;
    }
    return { tableName: rows[0].tableName, tenantId: rows[0].tenantId };
  }

  async save(shardKey: string, cursor: WorkCursor, runId: string): Promise<void> {
    await this.sql`
      INSERT INTO consolidation_checkpoints (shard_key, table_name, tenant_id, run_id, updated_at)
      VALUES (${shardKey}, ${cursor.tableName}, ${cursor.tenantId}, ${runId}, NOW())
      ON CONFLICT (shard_key) DO UPDATE
        SET table_name = EXCLUDED.table_name,
            tenant_id = EXCLUDED.tenant_id,
            run_id = EXCLUDED.run_id,
            updated_at = EXCLUDED.updated_at
    `;
  }

  async clear(shardKey: string): Promise<void> {
    await this.sql`
      DELETE FROM consolidation_checkpoints WHERE shard_key = ${shardKey}
    `;
  }
}
