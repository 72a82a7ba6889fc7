import type { FastifyInstance } from 'fastify';
import { Type, type Static } from '@sinclair/typebox';
import { PreconditionError } from '../../errors.js';
import type { HealingService } from '../../heal/service.js';
import type { HealingRecord, SessionStore } from '../../store/session-store.js';

const CreateSessionSchema = Type.Object({
  files: Type.Record(Type.String(), Type.String()),
  entryPoint: Type.Optional(Type.String({ minLength: 1 })),
  maxAttempts: Type.Optional(Type.Integer({ minimum: 1, maximum: 50 })),
});

const ResumeSchema = Type.Object({
  attempts: Type.Optional(Type.Integer({ minimum: 1, maximum: 50 })),
});

const SessionParams = Type.Object({
  id: Type.String(),
});

type CreateSessionBody = Static<typeof CreateSessionSchema>;
type ResumeBody = Static<typeof ResumeSchema>;
type SessionParamsType = Static<typeof SessionParams>;

export interface SessionRoutesOptions {
  service: HealingService;
  store: SessionStore;
  defaultMaxAttempts: number;
  skipDispatch: boolean;
}

function summarize(record: HealingRecord) {
  return {
    id: record.id,
    status: record.status,
    entryPoint: record.entryPoint,
    attempts: record.history.length,
    maxAttempts: record.maxAttempts,
    created_at: record.created_at,
    finished_at: record.finished_at,
  };
}

export async function sessionRoutes(app: FastifyInstance, opts: SessionRoutesOptions) {
  const { service, store } = opts;

  app.post<{ Body: CreateSessionBody }>('/api/sessions', {
    schema: { body: CreateSessionSchema },
  }, async (req, reply) => {
    let record: HealingRecord;
    try {
      record = service.submit({
        files: req.body.files,
        entryPoint: req.body.entryPoint,
        maxAttempts: req.body.maxAttempts ?? opts.defaultMaxAttempts,
      });
    } catch (err) {
      if (err instanceof PreconditionError) return reply.status(400).send({ error: err.message });
      throw err;
    }
    if (!opts.skipDispatch) {
      service.dispatch(record.id, id => service.run(id));
    }
    return reply.status(201).send(record);
  });

  app.get('/api/sessions', async () => {
    return store.list().map(summarize);
  });

  app.get<{ Params: SessionParamsType }>('/api/sessions/:id', {
    schema: { params: SessionParams },
  }, async (req, reply) => {
    const record = store.get(req.params.id);
    if (!record) return reply.status(404).send({ error: 'Not found' });
    return record;
  });

  app.post<{ Params: SessionParamsType; Body: ResumeBody }>('/api/sessions/:id/resume', {
    schema: { params: SessionParams, body: ResumeSchema },
  }, async (req, reply) => {
    const record = store.get(req.params.id);
    if (!record) return reply.status(404).send({ error: 'Not found' });
    if (record.status !== 'exhausted') {
      return reply.status(409).send({ error: `Session is ${record.status}; only exhausted sessions can be resumed` });
    }
    const attempts = req.body?.attempts ?? opts.defaultMaxAttempts;
    if (!opts.skipDispatch) {
      service.dispatch(record.id, id => service.resume(id, attempts));
    }
    return reply.status(202).send(summarize(record));
  });
}
