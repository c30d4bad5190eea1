import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('stock_documents', {
    id: { type: 'uuid', primaryKey: true },
    kind: { type: 'text', notNull: true },
    number: { type: 'text', notNull: true },
    status: { type: 'text', notNull: true, default: 'draft' },
    notes: { type: 'text' },
    supplier: { type: 'text' },
    invoice_number: { type: 'text' },
    department: { type: 'text' },
    requester: { type: 'text' },
    purpose: { type: 'text' },
    created_by: { type: 'text' },
    processed_by: { type: 'text' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    completed_at: { type: 'timestamptz' }
  });
  pgm.addConstraint('stock_documents', 'uq_stock_documents_kind_number', 'UNIQUE (kind, number)');
  pgm.addConstraint(
    'stock_documents',
    'chk_stock_documents_kind',
    "CHECK (kind IN ('receipt','issue','inventory_count'))"
  );
  pgm.addConstraint(
    'stock_documents',
    'chk_stock_documents_status',
    "CHECK (status IN ('draft','confirmed','cancelled'))"
  );
  pgm.createIndex('stock_documents', ['kind', 'status', 'created_at'], {
    name: 'idx_stock_documents_kind_status_created'
  });

  pgm.createTable('stock_document_lines', {
    id: { type: 'uuid', primaryKey: true },
    document_id: {
      type: 'uuid',
      notNull: true,
      references: 'stock_documents',
      onDelete: 'CASCADE'
    },
    line_number: { type: 'integer', notNull: true },
    item_id: { type: 'uuid', notNull: true, references: 'items' },
    location_id: { type: 'uuid', references: 'locations' },
    quantity: { type: 'numeric(18,6)', notNull: true },
    unit_price: { type: 'numeric(18,6)' },
    expected_quantity: { type: 'numeric(18,6)' },
    discrepancy: { type: 'numeric(18,6)' }
  });
  pgm.addConstraint(
    'stock_document_lines',
    'uq_stock_document_lines_document_line',
    'UNIQUE (document_id, line_number)'
  );
  pgm.addConstraint('stock_document_lines', 'chk_stock_document_lines_quantity', 'CHECK (quantity >= 0)');
  pgm.createIndex('stock_document_lines', 'document_id', { name: 'idx_stock_document_lines_document_id' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('stock_document_lines');
  pgm.dropTable('stock_documents');
}
