import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../app';
import { ContactStore } from '../db/contactStore';
import { PlacesClient } from '../places/placesClient';
import { FakeContactsDb } from '../test-utils/fakeContactsDb';
import { TestServer, postJson, startTestServer } from '../test-utils/testServer';

const config = {
  host: 'localhost',
  port: 5432,
  database: 'contacts',
  user: 'tester',
  password: 'test-secret',
};

describe('contact routes', () => {
  let db: FakeContactsDb;
  let store: ContactStore;
  let server: TestServer;

  beforeEach(async () => {
    db = new FakeContactsDb();
    store = new ContactStore(config, db.factory);
    server = await startTestServer(createApp({ store }));
  });

  afterEach(async () => {
    await server.close();
  });

  it('creates a contact and answers with its id', async () => {
    const response = await postJson(server.url('/contacts'), { Name: 'Ann', Lastname: 'Lee' });

    expect(response.status).toBe(201);
    expect(await response.json()).toEqual({ contactId: 1 });
  });

  it('refuses a contact whose required fields are invalid', async () => {
    const response = await postJson(server.url('/contacts'), { Name: 'J0hn', Lastname: 'Lee' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Contact could not be created' });
    expect(db.rows).toHaveLength(0);
  });

  it('refuses a body with non-text values', async () => {
    const response = await postJson(server.url('/contacts'), { Name: 7, Lastname: 'Lee' });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: 'Invalid contact' });
  });

  it('lists and searches contacts', async () => {
    await store.insert({ Name: 'Ann', Lastname: 'Lee', Email: 'ann@example.com' });
    await store.insert({ Name: 'Bob', Lastname: 'Ray' });

    const listed = await fetch(server.url('/contacts'));
    expect(listed.status).toBe(200);
    expect(await listed.json()).toEqual({
      contacts: [
        { contactId: 1, name: 'Ann', lastname: 'Lee' },
        { contactId: 2, name: 'Bob', lastname: 'Ray' },
      ],
    });

    const found = await fetch(server.url('/contacts/search?email=ann%40example.com'));
    expect(found.status).toBe(200);
    expect(await found.json()).toEqual({
      contacts: [
        {
          contactId: 1,
          name: 'Ann',
          lastname: 'Lee',
          phone: null,
          direction: null,
          email: 'ann@example.com',
          web: null,
        },
      ],
    });
  });

  it('rejects repeated search parameters', async () => {
    const response = await fetch(server.url('/contacts/search?name=Ann&name=Bob'));

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: 'Invalid search criteria' });
  });

  it('updates an existing contact', async () => {
    await store.insert({ Name: 'Ann', Lastname: 'Lee' });

    const response = await postJson(server.url('/contacts/1'), { name: 'Anna', lastname: 'Lee' }, 'PUT');

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ updated: 1 });
    expect(db.rows[0].name).toBe('Anna');
  });

  it('answers 404 for an unknown contact', async () => {
    const updated = await postJson(server.url('/contacts/42'), { Name: 'Ann', Lastname: 'Lee' }, 'PUT');
    expect(updated.status).toBe(404);
    expect(await updated.json()).toEqual({ error: 'Contact not found or not updated' });

    const deleted = await fetch(server.url('/contacts/42'), { method: 'DELETE' });
    expect(deleted.status).toBe(404);
    expect(await deleted.json()).toEqual({ error: 'Contact not found' });
  });

  it('answers 400 for a malformed id', async () => {
    const response = await fetch(server.url('/contacts/abc'), { method: 'DELETE' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Invalid contact id' });
    expect(db.clients).toHaveLength(0);
  });

  it('deletes a contact', async () => {
    await store.insert({ Name: 'Ann', Lastname: 'Lee' });

    const response = await fetch(server.url('/contacts/1'), { method: 'DELETE' });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ deleted: 1 });
    expect(db.rows).toHaveLength(0);
  });
});

describe('contact creation with a place lookup', () => {
  it('fills the direction from the first place found', async () => {
    const db = new FakeContactsDb();
    const get = vi.fn();
    get.mockResolvedValue({ status: 200, data: { status: 'OK', results: [{ formatted_address: '5 Harbor Rd' }] } });
    const places = new PlacesClient({ apiKey: 'test-key' }, { get });
    const server = await startTestServer(createApp({ store: new ContactStore(config, db.factory), places }));

    try {
      const response = await postJson(server.url('/contacts'), {
        Name: 'Ann',
        Lastname: 'Lee',
        placeQuery: 'harbor office',
      });

      expect(response.status).toBe(201);
      expect(db.rows[0].direction).toBe('5 Harbor Rd');
    } finally {
      await server.close();
    }
  });
});
