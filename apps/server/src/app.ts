import cors from 'cors';
import express, { type ErrorRequestHandler, type Express, type Response } from 'express';

import { erdFromDefinition } from '@mermaid-models/erd';
import { requirementDiagramFromDefinition } from '@mermaid-models/requirements';
import { DefinitionError, MissingNodeError } from '@mermaid-models/shared';

import type { ServerConfig } from './config.js';

type DiagramType = 'erDiagram' | 'requirementDiagram';

function sendDiagram(res: Response, type: DiagramType, text: string, format: unknown) {
  if (format === 'text') {
    res.type('text/plain').send(text);
    return;
  }
  res.json({ type, text });
}

// body-parser tags malformed or oversized payloads with the HTTP status to answer.
function statusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') return status;
  }
  return 500;
}

export function createApp(config: ServerConfig): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: config.bodyLimit }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.post('/api/erd/render', (req, res) => {
    try {
      const diagram = erdFromDefinition(req.body);
      sendDiagram(res, 'erDiagram', diagram.render(), req.query.format);
    } catch (error) {
      if (error instanceof DefinitionError) {
        res.status(400).json({ message: 'Invalid ERD definition', details: String(error) });
        return;
      }
      throw error;
    }
  });

  app.post('/api/requirements/render', (req, res) => {
    try {
      const diagram = requirementDiagramFromDefinition(req.body);
      sendDiagram(res, 'requirementDiagram', diagram.render(), req.query.format);
    } catch (error) {
      if (error instanceof DefinitionError) {
        res.status(400).json({
          message: 'Invalid requirement diagram definition',
          details: String(error),
        });
        return;
      }
      if (error instanceof MissingNodeError) {
        res.status(422).json({
          message: 'Relationship references an unknown node',
          details: String(error),
          nodeName: error.nodeName,
        });
        return;
      }
      throw error;
    }
  });

  const handleError: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
    const status = statusOf(error);
    if (status >= 500) {
      console.error('Render request failed', error);
    }
    res.status(status).json({ message: 'Render failed', details: String(error) });
  };
  app.use(handleError);

  return app;
}
