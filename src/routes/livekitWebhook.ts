import express, { Router, type Request, type Response } from 'express';
import type { SessionManager } from '../calls/sessionManager';
import { log } from '../log';
import { requestIdOf } from './requestContext';

/** The fields of a verified platform event this router reads. */
export interface VerifiedWebhookEvent {
  event: string;
  room?: { name: string };
  participant?: { identity: string };
}

export interface WebhookVerifier {
  receive(body: string, authHeader?: string): Promise<VerifiedWebhookEvent>;
}

/** Routes verified platform events for rooms this process owns. */
export function createLiveKitWebhookRouter(sessionManager: SessionManager, verifier: WebhookVerifier): Router {
  const router = Router();

  async function handle(req: Request, res: Response): Promise<void> {
    const requestId = requestIdOf(res);
    const body: unknown = req.body;
    if (typeof body !== 'string' || body === '') {
      res.status(400).json({ error: 'empty_body' });
      return;
    }

    let event: VerifiedWebhookEvent;
    try {
      event = await verifier.receive(body, req.header('authorization'));
    } catch (error) {
      log.warn({ err: error, event: 'livekit_webhook_rejected', requestId }, 'livekit webhook rejected');
      res.status(401).json({ error: 'invalid_signature' });
      return;
    }

    const roomName = event.room?.name;
    log.info({ event: 'livekit_webhook', type: event.event, room: roomName, requestId }, 'livekit webhook received');

    if (roomName) {
      if (event.event === 'room_finished') {
        sessionManager.onRoomClosed(roomName, 'room_finished');
      } else if (event.event === 'participant_left' && event.participant) {
        sessionManager.onParticipantLeft(roomName, event.participant.identity);
      }
    }

    res.status(200).json({ received: true });
  }

  router.post('/', express.text({ type: '*/*' }), (req, res, next) => {
    handle(req, res).catch(next);
  });

  return router;
}
