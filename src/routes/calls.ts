import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { SessionManager } from '../calls/sessionManager';
import { DialRequestBodySchema, toDialInfo } from '../calls/types';
import { log } from '../log';
import type { RecordingMonitor } from '../recording/recordingMonitor';
import { toRecordingView } from '../recording/types';
import { requestIdOf } from './requestContext';

export type RecordingLookup = Pick<RecordingMonitor, 'getRecordingInfo'>;

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export function createCallsRouter(sessionManager: SessionManager, recordings: RecordingLookup | null = null): Router {
  const router = Router();

  async function handleCreate(req: Request, res: Response): Promise<void> {
    const requestId = requestIdOf(res);
    const body: unknown = req.body;
    const parsed = DialRequestBodySchema.safeParse(body);
    if (!parsed.success) {
      log.warn(
        { event: 'dial_request_invalid', issues: parsed.error.issues, requestId },
        'invalid dial request',
      );
      res.status(400).json({
        success: false,
        error: 'invalid_request',
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
      return;
    }

    const result = await sessionManager.createCall(toDialInfo(parsed.data), parsed.data.interaction_id, {
      requestId,
    });

    if (!result.ok) {
      const status = result.reason === 'at_capacity' ? 429 : 409;
      res.status(status).json({ success: false, error: result.reason });
      return;
    }

    res.status(200).json({
      success: true,
      call_id: result.session.callId,
      room_name: result.session.roomName,
      message: 'call dispatched',
    });
  }

  router.post('/', (req, res, next) => {
    handleCreate(req, res).catch(next);
  });

  async function handleRecording(req: Request, res: Response): Promise<void> {
    const callId = req.params.callId;
    const job =
      sessionManager.get(callId)?.getRecordingJob() ?? (recordings ? await recordings.getRecordingInfo(callId) : null);
    if (!job) {
      res.status(404).json({ error: 'recording_not_found' });
      return;
    }
    res.status(200).json(toRecordingView(job));
  }

  router.get('/', (req, res) => {
    const parsed = ListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: 'invalid_request',
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
      return;
    }
    res.status(200).json({
      total: sessionManager.size,
      calls: sessionManager.list(parsed.data.limit).map((session) => session.view()),
    });
  });

  router.get('/:callId/recording', (req, res, next) => {
    handleRecording(req, res).catch(next);
  });

  router.get('/:callId', (req, res) => {
    const session = sessionManager.get(req.params.callId);
    if (!session) {
      res.status(404).json({ error: 'call_not_found' });
      return;
    }
    res.status(200).json(session.view());
  });

  return router;
}
