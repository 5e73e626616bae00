import { Router } from 'express';
import { createContactController } from './controller/contactController';
import { createPlacesController } from './controller/placesController';
import { ContactStore } from './db/contactStore';
import { PlacesClient } from './places/placesClient';

export interface AppDependencies {
  store: ContactStore;
  places?: PlacesClient;
}

export function createRouter({ store, places }: AppDependencies): Router {
  const router = Router();
  const contacts = createContactController(store, places);

  router.get('/health', async (_req, res) => {
    const database = await store.checkDatabase();
    if (database === null) {
      res.status(503).json({ status: 'unavailable' });
      return;
    }
    res.status(200).json({ status: 'ok', database });
  });

  router.get('/contacts', contacts.listContacts);
  router.get('/contacts/search', contacts.searchContacts);
  router.post('/contacts', contacts.createContact);
  router.put('/contacts/:id', contacts.updateContact);
  router.delete('/contacts/:id', contacts.deleteContact);

  if (places) {
    router.get('/places/search', createPlacesController(places).searchPlaces);
  }

  return router;
}
