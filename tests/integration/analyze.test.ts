import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { analyzeConfig, analyzeIndexes, analyzeNPlusOne } from '../../src/index.js';
import { toJson } from '../../src/core/report/toJson.js';
import { toText } from '../../src/core/report/toText.js';
import { ConfigFileMissingError, SchemaFileMissingError } from '../../src/util/errors.js';
import type { Finding } from '../../src/core/report/reportTypes.js';

const APP_DIR = resolve(import.meta.dirname, '../fixtures/rails-app');
const BARE_DIR = resolve(import.meta.dirname, '../fixtures/bare-app');

function describeFinding(f: Finding): string {
  switch (f.location.kind) {
    case 'schema':
      return `${f.type} ${f.location.table}.${f.location.column}`;
    case 'source':
      return `${f.type} ${f.location.file}:${String(f.location.line)}`;
    case 'query':
      return `${f.type} ${f.location.column}@${f.location.file}:${String(f.location.line)}`;
    case 'config':
      return `${f.type} ${f.location.environment}/${f.location.setting}`;
  }
}

describe('analyzeIndexes (integration)', () => {
  it('reports foreign keys, WHERE columns and boolean columns', async () => {
    const result = await analyzeIndexes({ root: APP_DIR, noTimestamp: true });

    expect(result.kind).toBe('indexes');
    expect([...result.schema.keys()]).toEqual(['comments', 'posts', 'users']);
    expect(result.summary.findings.map(describeFinding)).toEqual([
      'missing_foreign_key_index comments.user_id',
      'missing_foreign_key_index posts.category_id',
      'where_clause_column status@app/controllers/posts_controller.rb:3',
      'where_clause_column title@app/controllers/posts_controller.rb:22',
      'where_clause_column user_id@app/models/post.rb:10',
      'where_clause_column published@app/models/post.rb:10',
      'where_clause_column active@app/models/user.rb:7',
      'boolean_index_opportunity comments.is_flagged',
      'boolean_index_opportunity posts.is_featured',
      'boolean_index_opportunity users.active',
      'boolean_index_opportunity users.has_avatar',
    ]);
    expect(result.summary.groups.map((g) => [g.type, g.count])).toEqual([
      ['missing_foreign_key_index', 2],
      ['boolean_index_opportunity', 4],
      ['where_clause_column', 5],
    ]);
    expect(result.metadata).toEqual({ root: APP_DIR, timestamp: null, findingCount: 11, filesScanned: 5 });
    expect(result.scanErrors).toEqual([]);
  });

  it('produces identical output on repeated runs', async () => {
    const first = toJson(await analyzeIndexes({ root: APP_DIR, noTimestamp: true }), false);
    const second = toJson(await analyzeIndexes({ root: APP_DIR, noTimestamp: true }), false);
    expect(first).toBe(second);
  });

  it('formats the report as text', async () => {
    const text = toText(await analyzeIndexes({ root: APP_DIR, noTimestamp: true }));
    const lines = text.split('\n');

    expect(lines[0]).toBe('=== Index Analysis ===');
    expect(lines).toContain('Findings:  11 (2 warning, 9 info)');
    expect(lines).toContain('  Table: comments');
    expect(lines).toContain('    Indexed: user_id, published');
    expect(lines).toContain('--- Missing Foreign Key Indexes (2) ---');
    expect(lines).toContain('  [WARNING] comments.user_id');
    expect(lines).toContain('    Suggestion: add_index :comments, :user_id');
    expect(lines).toContain('  [INFO] active (app/models/user.rb:7)');
    expect(text).not.toContain('Timestamp:');
  });

  it('fails when db/schema.rb is missing', async () => {
    await expect(analyzeIndexes({ root: BARE_DIR })).rejects.toBeInstanceOf(SchemaFileMissingError);
  });
});

describe('analyzeNPlusOne (integration)', () => {
  it('reports controller and view findings with the association inventory', async () => {
    const result = await analyzeNPlusOne({ root: APP_DIR, noTimestamp: true });

    expect(result.summary.findings.map(describeFinding)).toEqual([
      'potential_n_plus_one app/controllers/posts_controller.rb:13',
      'view_association_access app/views/posts/index.html.erb:4',
      'view_association_access app/views/posts/index.html.erb:5',
      'view_association_access app/views/users/show.html.haml:2',
    ]);
    expect(result.summary.severityCounts).toEqual({ warning: 1, info: 3 });
    expect(result.associations).toEqual([
      { file: 'app/models/post.rb', model: 'post', hasMany: ['comments'], hasOne: [], belongsTo: ['user', 'category'] },
      { file: 'app/models/user.rb', model: 'user', hasMany: ['posts', 'comments'], hasOne: ['profile'], belongsTo: [] },
    ]);
    expect(result.metadata.filesScanned).toBe(6);
  });

  it('finds nothing in an application without sources', async () => {
    const result = await analyzeNPlusOne({ root: BARE_DIR, noTimestamp: true });
    expect(result.summary.findings).toEqual([]);
    expect(toText(result)).toContain('No issues detected.');
  });
});

describe('analyzeConfig (integration)', () => {
  it('reviews every environment of database.yml', async () => {
    const result = await analyzeConfig({ root: APP_DIR, noTimestamp: true });

    expect(result.environments).toEqual(['development', 'test', 'production']);
    expect(result.summary.findings.map(describeFinding)).toEqual([
      'statement_timeout development/statement_timeout',
      'checkout_timeout development/checkout_timeout',
      'connection_pool_size test/pool',
      'statement_timeout test/statement_timeout',
      'checkout_timeout test/checkout_timeout',
      'connection_pool_size production/pool',
      'checkout_timeout production/checkout_timeout',
      'prepared_statements production/prepared_statements',
      'reaping_frequency production/reaping_frequency',
      'ssl_configuration production/sslmode',
      'performance_extensions all/extensions',
    ]);
    expect(result.summary.severityCounts).toEqual({ warning: 4, info: 7 });
  });

  it('fails when config/database.yml is missing', async () => {
    await expect(analyzeConfig({ root: BARE_DIR })).rejects.toBeInstanceOf(ConfigFileMissingError);
  });
});
