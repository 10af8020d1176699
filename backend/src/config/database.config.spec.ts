import { DataSource } from 'typeorm';
import { buildDataSourceOptions, parseBoolean, sqliteFileFromUrl } from './database.config';
import { Supplier } from '../entities/supplier.entity';

describe('database config', () => {
  it('falls back to the embedded SQLite file when no URL is set', () => {
    const options = buildDataSourceOptions(undefined);

    expect(options.type).toBe('better-sqlite3');
    expect(options.database).toBe('./achats_local.db');
    expect(options.synchronize).toBe(true);
  });

  it('treats a blank URL like a missing one', () => {
    expect(buildDataSourceOptions('   ').database).toBe('./achats_local.db');
  });

  it('uses PostgreSQL for any other connection string', () => {
    const options = buildDataSourceOptions('postgres://achats:test-secret@db:5432/achats', false);

    expect(options).toMatchObject({
      type: 'postgres',
      url: 'postgres://achats:test-secret@db:5432/achats',
      synchronize: false,
    });
  });

  it.each([
    ['sqlite::memory:', ':memory:'],
    ['sqlite:./data/achats.db', './data/achats.db'],
    ['sqlite:///var/lib/achats.db', '/var/lib/achats.db'],
    ['sqlite:', ':memory:'],
  ])('maps %s to the SQLite file %s', (url, file) => {
    expect(sqliteFileFromUrl(url)).toBe(file);
  });

  it('parses boolean flags with a fallback', () => {
    expect(parseBoolean(undefined, true)).toBe(true);
    expect(parseBoolean('', false)).toBe(false);
    expect(parseBoolean('false', true)).toBe(false);
    expect(parseBoolean('YES', false)).toBe(true);
    expect(parseBoolean('1', false)).toBe(true);
  });

  it('creates the whole schema on an in-memory database', async () => {
    const dataSource = new DataSource(buildDataSourceOptions('sqlite::memory:'));
    await dataSource.initialize();

    try {
      const contact = dataSource.getMetadata(Supplier).findColumnWithPropertyName('contact');
      expect(contact?.type).toBe('varchar');
      expect(contact?.isNullable).toBe(true);

      const supplier = await dataSource.getRepository(Supplier).save({ name: 'Bureau Fournitures', contact: null });
      expect(supplier.contact).toBeNull();
    } finally {
      await dataSource.destroy();
    }
  });
});
