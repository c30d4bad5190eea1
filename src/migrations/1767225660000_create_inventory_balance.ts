import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('inventory_balance', {
    item_id: { type: 'uuid', notNull: true, references: 'items' },
    location_id: { type: 'uuid', notNull: true, references: 'locations' },
    on_hand: { type: 'numeric(18,6)', notNull: true, default: 0 },
    reserved: { type: 'numeric(18,6)', notNull: true, default: 0 },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz' }
  });
  pgm.addConstraint('inventory_balance', 'pk_inventory_balance', 'PRIMARY KEY (item_id, location_id)');
  pgm.addConstraint('inventory_balance', 'chk_inventory_balance_on_hand_nonnegative', 'CHECK (on_hand >= 0)');
  pgm.addConstraint('inventory_balance', 'chk_inventory_balance_reserved_nonnegative', 'CHECK (reserved >= 0)');
  pgm.createIndex('inventory_balance', 'location_id', { name: 'idx_inventory_balance_location_id' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('inventory_balance');
}
