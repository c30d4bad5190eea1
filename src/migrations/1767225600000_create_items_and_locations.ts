import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('items', {
    id: { type: 'uuid', primaryKey: true },
    code: { type: 'text', notNull: true },
    name: { type: 'text', notNull: true },
    unit: { type: 'text', notNull: true, default: 'pcs' },
    category: { type: 'text' },
    description: { type: 'text' },
    min_stock: { type: 'numeric(18,6)', notNull: true, default: 0 },
    unit_price: { type: 'numeric(18,6)' },
    active: { type: 'boolean', notNull: true, default: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });
  pgm.addConstraint('items', 'uq_items_code', 'UNIQUE (code)');
  pgm.addConstraint('items', 'chk_items_min_stock_nonnegative', 'CHECK (min_stock >= 0)');
  pgm.addConstraint('items', 'chk_items_unit_price_nonnegative', 'CHECK (unit_price IS NULL OR unit_price >= 0)');

  pgm.createTable('locations', {
    id: { type: 'uuid', primaryKey: true },
    code: { type: 'text', notNull: true },
    description: { type: 'text' },
    active: { type: 'boolean', notNull: true, default: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });
  pgm.addConstraint('locations', 'uq_locations_code', 'UNIQUE (code)');
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('locations');
  pgm.dropTable('items');
}
