import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { buildSchemaModel, parseSchemaFile } from '../../src/core/railsSchema/parse.js';
import { MalformedSchemaError } from '../../src/util/errors.js';

const APP_DIR = resolve(import.meta.dirname, '../fixtures/rails-app');

describe('buildSchemaModel', () => {
  it('builds one table per block', () => {
    const schema = buildSchemaModel('create_table "posts" do |t| t.integer "user_id" end');
    expect([...schema.keys()]).toEqual(['posts']);
    expect(schema.get('posts')).toEqual({
      name: 'posts',
      columns: ['user_id'],
      foreignKeys: ['user_id'],
      indexes: [],
    });
  });

  it('returns an empty model for empty text', () => {
    expect(buildSchemaModel('').size).toBe(0);
  });

  it('ignores text it does not recognise', () => {
    const schema = buildSchemaModel('this is not a schema\ncreate_view "stats" do\nend\n');
    expect(schema.size).toBe(0);
  });

  it('keeps the last block for a duplicated table name, in its first position', () => {
    const content = [
      'create_table "a" do |t|',
      '  t.string "old"',
      'end',
      'create_table "b" do |t|',
      '  t.string "x"',
      'end',
      'create_table "a" do |t|',
      '  t.string "new"',
      'end',
    ].join('\n');

    const schema = buildSchemaModel(content);
    expect([...schema.keys()]).toEqual(['a', 'b']);
    expect(schema.get('a')!.columns).toEqual(['new']);
  });

  it('merges add_index statements and skips unknown tables', () => {
    const content = [
      'create_table "posts" do |t|',
      '  t.bigint "user_id"',
      'end',
      'add_index "posts", ["user_id"], name: "index_posts_on_user_id"',
      'add_index "ghosts", ["user_id"], name: "index_ghosts_on_user_id"',
    ].join('\n');

    const schema = buildSchemaModel(content);
    expect(schema.size).toBe(1);
    expect(schema.get('posts')!.indexes).toEqual(['user_id']);
    expect(schema.has('ghosts')).toBe(false);
  });
});

describe('parseSchemaFile', () => {
  it('parses the fixture schema', async () => {
    const schema = await parseSchemaFile(resolve(APP_DIR, 'db/schema.rb'));

    expect([...schema.keys()]).toEqual(['comments', 'posts', 'users']);
    expect(schema.get('comments')).toEqual({
      name: 'comments',
      columns: ['post_id', 'user_id', 'body', 'is_flagged', 'created_at'],
      foreignKeys: ['post_id', 'user_id'],
      indexes: ['post_id'],
    });
    expect(schema.get('posts')!.indexes).toEqual(['user_id', 'published']);
    expect(schema.get('users')!.foreignKeys).toEqual([]);
  });

  it('throws MalformedSchemaError when the file cannot be read', async () => {
    await expect(parseSchemaFile(resolve(APP_DIR, 'db/missing.rb'))).rejects.toBeInstanceOf(MalformedSchemaError);
  });
});
