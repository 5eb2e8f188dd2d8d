import { Actor } from '../domain/actor';

declare global {
  namespace Express {
    interface Request {
      user?: Actor;
    }
  }
}

export {};
