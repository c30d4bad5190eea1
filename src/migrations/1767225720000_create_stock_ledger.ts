import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('stock_ledger', {
    id: { type: 'uuid', primaryKey: true },
    sequence: { type: 'bigserial', notNull: true },
    action: { type: 'text', notNull: true },
    entity_type: { type: 'text', notNull: true },
    entity_id: { type: 'uuid' },
    item_id: { type: 'uuid', references: 'items' },
    location_id: { type: 'uuid', references: 'locations' },
    document_id: { type: 'uuid' },
    quantity_before: { type: 'numeric(18,6)' },
    quantity_after: { type: 'numeric(18,6)' },
    description: { type: 'text' },
    payload: { type: 'jsonb' },
    performed_by: { type: 'text' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });
  pgm.addConstraint('stock_ledger', 'uq_stock_ledger_sequence', 'UNIQUE (sequence)');
  pgm.addConstraint(
    'stock_ledger',
    'chk_stock_ledger_action',
    "CHECK (action IN ('create','update','delete','receipt','issue','adjust','inventory_count'))"
  );
  pgm.addConstraint(
    'stock_ledger',
    'chk_stock_ledger_entity_type',
    "CHECK (entity_type IN ('balance','item','location'))"
  );
  pgm.createIndex('stock_ledger', ['item_id', 'location_id', 'created_at'], {
    name: 'idx_stock_ledger_item_location_created'
  });
  pgm.createIndex('stock_ledger', 'document_id', { name: 'idx_stock_ledger_document_id' });
  pgm.createIndex('stock_ledger', ['created_at', 'sequence'], { name: 'idx_stock_ledger_created_sequence' });

  // Append-only: the application never updates or deletes ledger rows.
  pgm.sql(`
    CREATE OR REPLACE FUNCTION stock_ledger_reject_mutation() RETURNS trigger AS $$
    BEGIN
      RAISE EXCEPTION 'stock_ledger is append-only';
    END;
    $$ LANGUAGE plpgsql;
  `);
  pgm.sql(`
    CREATE TRIGGER trg_stock_ledger_append_only
      BEFORE UPDATE OR DELETE ON stock_ledger
      FOR EACH ROW EXECUTE FUNCTION stock_ledger_reject_mutation();
  `);
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.sql('DROP TRIGGER IF EXISTS trg_stock_ledger_append_only ON stock_ledger');
  pgm.sql('DROP FUNCTION IF EXISTS stock_ledger_reject_mutation()');
  pgm.dropTable('stock_ledger');
}
