/// <reference path="../types/express.d.ts" />
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

const REQUEST_ID_HEADER = 'x-request-id';

// Reuses a caller-supplied id so a batch can be traced across services
export const requestId = (req: Request, res: Response, next: NextFunction): void => {
  const incoming = req.get(REQUEST_ID_HEADER);
  req.requestId = incoming && incoming.trim() !== '' ? incoming.trim() : uuidv4();
  res.setHeader('X-Request-Id', req.requestId);
  next();
};
