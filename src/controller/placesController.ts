import { Request, Response } from 'express';
import { z } from 'zod';
import { ExternalServiceError, ValidationError } from '../lib/errors';
import logger from '../lib/logger';
import { PlacesClient } from '../places/placesClient';

const placesQuerySchema = z.object({
  query: z.string().optional(),
  lat: z.string().optional(),
  lng: z.string().optional(),
  location: z.string().optional(),
  radius: z.coerce.number().optional(),
  type: z.string().optional(),
  language: z.string().optional(),
  pagetoken: z.string().optional(),
});

export interface PlacesController {
  searchPlaces: (req: Request, res: Response) => Promise<void>;
}

export function createPlacesController(places: PlacesClient): PlacesController {
  async function searchPlaces(req: Request, res: Response) {
    const params = placesQuerySchema.safeParse(req.query);
    if (!params.success) {
      res.status(400).json({ error: 'Invalid places query', issues: params.error.issues });
      return;
    }

    const { query, lat, lng, location, radius, type, language, pagetoken } = params.data;
    try {
      const result = await places.search({
        query,
        latitude: lat,
        longitude: lng,
        location,
        radius,
        type,
        language,
        pageToken: pagetoken,
      });
      res.status(200).json(result);
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({ error: error.message, field: error.field });
        return;
      }
      if (error instanceof ExternalServiceError) {
        res.status(502).json({ error: error.message, status: error.status, retryable: error.isRetryable });
        return;
      }
      logger.error('[PlacesController] Error while searching places:', { error });
      res.status(500).json({ error: 'Internal server error' });
    }
  }

  return { searchPlaces };
}
