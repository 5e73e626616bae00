import { Client } from 'pg';
import { beforeEach, describe, expect, it } from 'vitest';
import { FakeContactsDb } from '../test-utils/fakeContactsDb';
import { ClientFactory, ContactStore } from './contactStore';

const config = {
  host: 'localhost',
  port: 5432,
  database: 'contacts',
  user: 'tester',
  password: 'test-secret',
};

describe('ContactStore', () => {
  let db: FakeContactsDb;
  let store: ContactStore;

  beforeEach(() => {
    db = new FakeContactsDb();
    store = new ContactStore(config, db.factory);
  });

  it('creates the table and is safe to call again', async () => {
    expect(await store.ensureSchema()).toBe(true);
    expect(await store.ensureSchema()).toBe(true);

    expect(db.tableCreated).toBe(true);
    expect(db.statementsMatching(/^CREATE TABLE/)).toHaveLength(2);
    expect(db.statementsMatching(/^COMMIT$/)).toHaveLength(2);
  });

  it('reports the server version', async () => {
    expect(await store.checkDatabase()).toBe('PostgreSQL 16.3');
  });

  it('inserts a contact that then shows up exactly once', async () => {
    const contactId = await store.insert({
      Name: 'John.Doe',
      Lastname: 'Smith-Jones',
      Phone: '(555) 123-4567',
      Direction: '12 Main St',
      Email: 'john@example.com',
      Web: 'https://www.example.com',
    });

    expect(contactId).toBe(1);
    expect(await store.list()).toEqual([{ contactId: 1, name: 'John.Doe', lastname: 'Smith-Jones' }]);
    expect(await store.search({ name: 'John.Doe' })).toEqual([
      {
        contactId: 1,
        name: 'John.Doe',
        lastname: 'Smith-Jones',
        phone: '(555) 123-4567',
        direction: '12 Main St',
        email: 'john@example.com',
        web: 'https://www.example.com',
      },
    ]);
  });

  it('binds values as parameters instead of writing them into the SQL', async () => {
    await store.insert({ name: 'Ann', lastname: 'Lee', direction: "1 O'Neil's Row" });

    const [insert] = db.statementsMatching(/^INSERT/);
    expect(insert.text).toBe(
      'INSERT INTO Contacts (Name, Lastname, Phone, Direction, Email, Web) VALUES ($1, $2, $3, $4, $5, $6) RETURNING Contact_id'
    );
    expect(insert.values).toEqual(['Ann', 'Lee', null, "1 O'Neil's Row", null, null]);
  });

  it('drops invalid optional fields and keeps the record', async () => {
    const contactId = await store.insert({ Name: 'Ann', Lastname: 'Lee', Phone: 'notaphone', Email: 'a-at-b' });

    expect(contactId).toBe(1);
    expect(db.rows[0]).toMatchObject({ name: 'Ann', lastname: 'Lee', phone: null, email: null });
  });

  it('rejects a record whose required fields are invalid without touching storage', async () => {
    expect(await store.insert({ Name: 'J0hn', Lastname: 'Doe' })).toBeNull();
    expect(await store.insert({ Name: 'John' })).toBeNull();

    expect(db.clients).toHaveLength(0);
    expect(db.rows).toHaveLength(0);
  });

  it('updates in place and keeps the identifier', async () => {
    const contactId = await store.insert({ Name: 'Ann', Lastname: 'Lee' });
    expect(contactId).toBe(1);

    const updated = await store.update({ Name: 'Anna', Lastname: 'Lee', Email: 'anna@example.com' }, 1);

    expect(updated).toBe(1);
    expect(db.rows).toEqual([
      {
        contact_id: 1,
        name: 'Anna',
        lastname: 'Lee',
        phone: null,
        direction: null,
        email: 'anna@example.com',
        web: null,
      },
    ]);
  });

  it('refuses an update whose required fields are invalid without touching storage', async () => {
    expect(await store.update({ Name: 'J0hn', Lastname: 'Lee' }, 1)).toBe(0);

    expect(db.clients).toHaveLength(0);
  });

  it('rolls back, releases the connection and returns zero when the update fails', async () => {
    await store.insert({ Name: 'Ann', Lastname: 'Lee' });
    db.failOn = /^UPDATE/;

    expect(await store.update({ Name: 'Anna', Lastname: 'Lee' }, 1)).toBe(0);

    expect(db.statementsMatching(/^ROLLBACK$/)).toHaveLength(1);
    expect(db.rows[0].name).toBe('Ann');
    expect(db.clients.every((client) => client.ended)).toBe(true);
  });

  it('returns zero rows for unknown or invalid identifiers', async () => {
    expect(await store.update({ Name: 'Ann', Lastname: 'Lee' }, 42)).toBe(0);
    expect(await store.delete(42)).toBe(0);
    expect(await store.update({ Name: 'Ann', Lastname: 'Lee' }, -1)).toBe(0);
    expect(await store.delete(Number.NaN)).toBe(0);
  });

  it('deletes contacts and never reuses their identifier', async () => {
    await store.insert({ Name: 'Ann', Lastname: 'Lee' });

    expect(await store.delete(1)).toBe(1);
    expect(await store.list()).toEqual([]);
    expect(await store.insert({ Name: 'Bob', Lastname: 'Ray' })).toBe(2);
  });

  it('returns no rows and runs no query when no criteria are given', async () => {
    await store.insert({ Name: 'Ann', Lastname: 'Lee' });
    const clientsBefore = db.clients.length;

    expect(await store.search({})).toEqual([]);
    expect(await store.search({ name: '  ', email: null })).toEqual([]);
    expect(db.clients).toHaveLength(clientsBefore);
  });

  it('searches by name sorted by name then lastname', async () => {
    await store.insert({ Name: 'Jane', Lastname: 'Zimmer' });
    await store.insert({ Name: 'John', Lastname: 'Adams' });
    await store.insert({ Name: 'Jane', Lastname: 'Adams' });

    const results = await store.search({ name: 'Jane' });

    expect(results.map((contact) => [contact.contactId, contact.lastname])).toEqual([
      [3, 'Adams'],
      [1, 'Zimmer'],
    ]);
  });

  it('combines filters and matches direction as a case-sensitive substring', async () => {
    await store.insert({ Name: 'Ann', Lastname: 'Lee', Direction: '12 Main St', Email: 'ann@example.com' });
    await store.insert({ Name: 'Ann', Lastname: 'Ray', Direction: '4 main road', Email: 'ann@example.com' });
    await store.insert({ Name: 'Bob', Lastname: 'Ray', Direction: '9 Main Ave', Email: 'bob@example.com' });

    const results = await store.search({ direction: 'Main', email: 'ann@example.com' });

    expect(results.map((contact) => contact.contactId)).toEqual([1]);
    const [select] = db.statementsMatching(/WHERE/);
    expect(select.values).toEqual(['%Main%', 'ann@example.com']);
  });

  it('rolls back, releases the connection and returns null when the insert fails', async () => {
    db.failOn = /^INSERT/;

    expect(await store.insert({ Name: 'Ann', Lastname: 'Lee' })).toBeNull();

    expect(db.statementsMatching(/^ROLLBACK$/)).toHaveLength(1);
    expect(db.statementsMatching(/^COMMIT$/)).toHaveLength(0);
    expect(db.clients.every((client) => client.ended)).toBe(true);
  });

  it('returns benign values when the database is unreachable', async () => {
    db.failConnect = true;

    expect(await store.list()).toEqual([]);
    expect(await store.search({ name: 'Ann' })).toEqual([]);
    expect(await store.delete(1)).toBe(0);
    expect(await store.ensureSchema()).toBe(false);
    expect(await store.checkDatabase()).toBeNull();
    expect(db.clients).toHaveLength(5);
    expect(db.clients.every((client) => client.ended)).toBe(true);
  });

  it('ends every client it opens', async () => {
    await store.ensureSchema();
    await store.insert({ Name: 'Ann', Lastname: 'Lee' });
    await store.list();
    await store.search({ name: 'Ann' });
    await store.delete(1);

    expect(db.clients).toHaveLength(5);
    expect(db.clients.every((client) => client.ended)).toBe(true);
  });

  it('accepts pg clients from the factory', () => {
    const factory: ClientFactory = () => new Client({ ...config });

    expect(new ContactStore(config, factory)).toBeInstanceOf(ContactStore);
  });

  it('masks credentials in its description', () => {
    expect(String(store)).toBe(
      '<ContactStore: host=localhost, port=5432, dbname=contacts, user=XXXXXX, password=XXXXXXXXXXX>'
    );
  });
});
