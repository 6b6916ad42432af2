import { knex, type Knex } from 'knex';

// ---------------------------------------------------------------------------
// Database client
// ---------------------------------------------------------------------------

export function createDb(filename: string): Knex {
  return knex({
    client: 'better-sqlite3',
    connection: { filename },
    useNullAsDefault: true,
  });
}

// ---------------------------------------------------------------------------
// Schema bootstrap (idempotent)
// ---------------------------------------------------------------------------

export async function initDb(db: Knex): Promise<void> {
  // --- cleanup_runs --------------------------------------------------------
  // One row per run, updated as it moves through its phases.
  if (!(await db.schema.hasTable('cleanup_runs'))) {
    await db.schema.createTable('cleanup_runs', (t) => {
      t.increments('id').primary();
      t.string('trigger').notNullable();                            // schedule | manual | startup
      t.string('status').notNullable().defaultTo('running');        // running | completed | failed
      t.string('phase').notNullable().defaultTo('idle');
      t.string('cutoff').nullable();
      t.boolean('dry_run').notNullable().defaultTo(false);
      t.boolean('complete').nullable();
      t.integer('protected_count').nullable();
      t.integer('candidate_count').nullable();
      t.integer('skipped_count').nullable();
      t.integer('queued_count').nullable();
      t.integer('succeeded_count').nullable();
      t.integer('failed_count').nullable();
      t.integer('failed_batches').nullable();
      t.text('warnings').notNullable().defaultTo('[]');             // CleanupWarning[] as JSON
      t.text('error').nullable();
      t.string('started_at').notNullable();
      t.string('finished_at').nullable();
    });
  }

  // --- cleanup_deletions ---------------------------------------------------
  // Audit log of every queued deletion and what the backend answered.
  if (!(await db.schema.hasTable('cleanup_deletions'))) {
    await db.schema.createTable('cleanup_deletions', (t) => {
      t.increments('id').primary();
      t.integer('run_id').notNullable().references('id').inTable('cleanup_runs');
      t.string('user_id').notNullable();
      t.string('correlation_id').notNullable();
      t.integer('batch_index').notNullable();
      t.integer('status').nullable();                               // null when never submitted
      t.text('error').nullable();
      t.string('created_at').notNullable();
      t.index(['run_id']);
    });
  }
}
