import { Injectable } from '@nestjs/common';
import { CartSession } from './cart-session';

// One in-memory cart per authenticated user; never shared between users
@Injectable()
export class CartSessionStore {
  private readonly sessions = new Map<string, CartSession>();

  get(userId: string): CartSession {
    let session = this.sessions.get(userId);
    if (!session) {
      session = new CartSession(userId);
      this.sessions.set(userId, session);
    }
    return session;
  }

  discard(userId: string): void {
    this.sessions.delete(userId);
  }
}
