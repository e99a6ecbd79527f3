import { describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';

const schema = fs.readFileSync(path.resolve(__dirname, '../../database/schema.sql'), 'utf-8');

describe('database/schema.sql', () => {
  it.each([
    ['books', 'title'],
    ['books', 'author'],
    ['books', 'isbn'],
    ['loans', 'user_id'],
    ['loans', 'book_id'],
    ['loans', 'loan_date'],
    ['loans', 'due_date'],
  ])('indexes %s.%s', (table, column) => {
    expect(schema).toContain(`CREATE INDEX IF NOT EXISTS idx_${table}_${column} ON ${table}(${column});`);
  });

  it('cascades loan deletion from users and books', () => {
    expect(schema).toContain('user_id INT NOT NULL REFERENCES users(user_id) ON DELETE CASCADE');
    expect(schema).toContain('book_id INT NOT NULL REFERENCES books(book_id) ON DELETE CASCADE');
  });

  it('bounds available_quantity by quantity', () => {
    expect(schema).toContain('CHECK (available_quantity >= 0 AND available_quantity <= quantity)');
  });

  it('keys books by title and author', () => {
    expect(schema).toContain('CONSTRAINT books_title_author_key UNIQUE (title, author)');
  });

  it('keeps the additive user columns', () => {
    expect(schema).toContain('ALTER TABLE users ADD COLUMN IF NOT EXISTS phone VARCHAR(20) NULL;');
    expect(schema).toContain('ALTER TABLE users ADD COLUMN IF NOT EXISTS permissions TEXT;');
  });
});
