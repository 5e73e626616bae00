import express, { Express } from 'express';
import { AppDependencies, createRouter } from './routes';

export function createApp(dependencies: AppDependencies): Express {
  const app = express();
  app.use(express.json());
  app.use(createRouter(dependencies));
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  return app;
}
