import { Request, Response } from 'express';
import { z } from 'zod';
import { ContactStore } from '../db/contactStore';
import logger from '../lib/logger';
import { RawContactInput } from '../model/contact';
import { prefillDirection } from '../places/addressLookup';
import { PlacesClient } from '../places/placesClient';

const text = z.string().nullable().optional();

const contactBodySchema = z.object({
  Name: text,
  Lastname: text,
  Phone: text,
  Direction: text,
  Email: text,
  Web: text,
  name: text,
  lastname: text,
  phone: text,
  direction: text,
  email: text,
  web: text,
  placeQuery: z.string().optional(),
});

const searchQuerySchema = z.object({
  name: z.string().optional(),
  direction: z.string().optional(),
  email: z.string().optional(),
});

const contactIdSchema = z.coerce.number().int().positive();

type Handler = (req: Request, res: Response) => Promise<void>;

export interface ContactController {
  listContacts: Handler;
  searchContacts: Handler;
  createContact: Handler;
  updateContact: Handler;
  deleteContact: Handler;
}

function internalError(res: Response, action: string, error: unknown) {
  logger.error(`[ContactController] Error while ${action}:`, { error });
  res.status(500).json({ error: 'Internal server error' });
}

export function createContactController(store: ContactStore, places?: PlacesClient): ContactController {
  async function listContacts(_req: Request, res: Response) {
    try {
      const contacts = await store.list();
      res.status(200).json({ contacts });
    } catch (error) {
      internalError(res, 'listing contacts', error);
    }
  }

  async function searchContacts(req: Request, res: Response) {
    const criteria = searchQuerySchema.safeParse(req.query);
    if (!criteria.success) {
      res.status(400).json({ error: 'Invalid search criteria', issues: criteria.error.issues });
      return;
    }

    try {
      const contacts = await store.search(criteria.data);
      res.status(200).json({ contacts });
    } catch (error) {
      internalError(res, 'searching contacts', error);
    }
  }

  async function createContact(req: Request, res: Response) {
    const body = contactBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: 'Invalid contact', issues: body.error.issues });
      return;
    }

    try {
      const { placeQuery, ...fields } = body.data;
      let input: RawContactInput = fields;
      if (placeQuery && places) {
        input = await prefillDirection(input, places, placeQuery);
      }

      const contactId = await store.insert(input);
      if (contactId === null) {
        res.status(400).json({ error: 'Contact could not be created' });
        return;
      }
      res.status(201).json({ contactId });
    } catch (error) {
      internalError(res, 'creating contact', error);
    }
  }

  async function updateContact(req: Request, res: Response) {
    const contactId = contactIdSchema.safeParse(req.params.id);
    const body = contactBodySchema.omit({ placeQuery: true }).safeParse(req.body ?? {});
    if (!contactId.success || !body.success) {
      res.status(400).json({ error: 'Invalid contact id or body' });
      return;
    }

    try {
      const updated = await store.update(body.data, contactId.data);
      if (updated === 0) {
        res.status(404).json({ error: 'Contact not found or not updated' });
        return;
      }
      res.status(200).json({ updated });
    } catch (error) {
      internalError(res, 'updating contact', error);
    }
  }

  async function deleteContact(req: Request, res: Response) {
    const contactId = contactIdSchema.safeParse(req.params.id);
    if (!contactId.success) {
      res.status(400).json({ error: 'Invalid contact id' });
      return;
    }

    try {
      const deleted = await store.delete(contactId.data);
      if (deleted === 0) {
        res.status(404).json({ error: 'Contact not found' });
        return;
      }
      res.status(200).json({ deleted });
    } catch (error) {
      internalError(res, 'deleting contact', error);
    }
  }

  return { listContacts, searchContacts, createContact, updateContact, deleteContact };
}
