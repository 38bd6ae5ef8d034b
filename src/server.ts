import Fastify, { type FastifyError } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { resolve } from 'node:path';
import { ulid } from 'ulid';
import { loadConfig, type AppConfig } from './config.js';
import { createStores } from './stores.js';
import type { JobRepository } from './repositories/base.js';
import type { SkillCatalog } from './skills/base.js';
import { createExecutor, type Executor } from './executors/index.js';
import { JobWorker } from './worker/index.js';
import { JobListQuerySchema, JobParamsSchema, RunSkillSchema, SkillParamsSchema, toJobOut } from './schemas/job.js';
import { parseRequest } from './middleware/validation.js';
import { createRateLimit } from './middleware/rate-limit.js';
import { callerId, requireApiKey, requireCaller } from './middleware/auth.js';
import { errorResponse, frameworkReason, sendError } from './errors.js';

export interface ServerOptions {
  config?: AppConfig;
  /** Injected stores are not closed with the server. */
  repo?: JobRepository;
  catalog?: SkillCatalog;
  executor?: Executor;
}

export async function createServer(options: ServerOptions = {}) {
  const config = options.config ?? loadConfig();

  const stores = options.repo && options.catalog ? undefined : await createStores(config);
  const jobRepo = options.repo ?? stores?.repo;
  const catalog = options.catalog ?? stores?.catalog;
  if (!jobRepo || !catalog) {
    throw new Error('job repository and skill catalog are required');
  }
  const repoKind = options.repo ? 'injected' : config.repo.kind;

  const executor = options.executor ?? createExecutor(config.executor.kind, {
    catalog,
    preview: {
      delayMs: config.executor.previewDelayMs,
      maxPreviewChars: config.executor.previewMaxChars,
    },
  });

  const app = Fastify({
    logger: {
      level: config.server.logLevel,
      redact: ['req.body', 'req.headers["x-api-key"]'],
    },
    genReqId: () => ulid(),
  });

  const jobWorker = config.worker.embedded
    ? new JobWorker(jobRepo, executor, config.worker, app.log.child({ component: 'worker' }))
    : undefined;

  // Security
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  // CORS (dev-friendly)
  if (config.server.corsDev) {
    await app.register(cors, {
      origin: ['http://localhost:3000', 'http://localhost:5173'],
    });
  }

  // OpenAPI documentation
  await app.register(swagger, {
    mode: 'static',
    specification: {
      path: resolve(process.cwd(), 'contracts', 'openapi.yaml'),
      baseDir: process.cwd(),
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  // Echo X-Request-ID
  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const status = error.statusCode ?? 500;
    if (status < 500) {
      return reply.code(status).send({
        error: frameworkReason(status),
        message: error.message,
        code: error.code ?? 'BAD_REQUEST',
      });
    }
    request.log.error({ err: error }, 'unhandled route error');
    return reply.code(500).send(errorResponse('INTERNAL_ERROR'));
  });

  const apiKey = requireApiKey(config.auth.apiKey);
  const rateLimit = createRateLimit(config.rateLimit);

  app.get('/health', async () => {
    return {
      ok: true,
      jobs: await jobRepo.getStats(),
      worker: jobWorker ? jobWorker.getStats() : null,
      repo: { kind: repoKind },
    };
  });

  // POST /skills/:skillId/run - enqueue a run of the skill's latest version
  app.post('/skills/:skillId/run', {
    preHandler: [apiKey, requireCaller, rateLimit],
  }, async (request, reply) => {
    const params = parseRequest(SkillParamsSchema, 'params', request.params, reply);
    if (!params) return reply;
    const body = parseRequest(RunSkillSchema, 'body', request.body ?? {}, reply);
    if (!body) return reply;
    const userId = callerId(request);
    if (!userId) return sendError(reply, 'UNAUTHORIZED');

    const skill = await catalog.getSkill(params.skillId);
    if (!skill) {
      return sendError(reply, 'SKILL_NOT_FOUND');
    }
    if (!(await catalog.canView(skill, userId))) {
      return sendError(reply, 'FORBIDDEN');
    }

    const job = await jobRepo.createPending({
      skillId: skill.id,
      requestedBy: userId,
      inputText: body.input_text,
    });
    request.log.info({ jobId: job.id, skillId: skill.id }, 'job enqueued');

    return reply.code(201).send(toJobOut(job));
  });

  // GET /jobs - the caller's own jobs, newest first
  app.get('/jobs', {
    preHandler: [apiKey, requireCaller],
  }, async (request, reply) => {
    const query = parseRequest(JobListQuerySchema, 'query', request.query, reply);
    if (!query) return reply;
    const userId = callerId(request);
    if (!userId) return sendError(reply, 'UNAUTHORIZED');

    const result = await jobRepo.find({
      requestedBy: userId,
      skillId: query.skill_id,
      status: query.status,
      cursor: query.cursor,
      limit: query.limit,
    });

    return {
      jobs: result.jobs.map(toJobOut),
      next_cursor: result.nextCursor ?? null,
    };
  });

  // GET /jobs/:jobId - job details, visible to anyone who can view the skill
  app.get('/jobs/:jobId', {
    preHandler: [apiKey, requireCaller],
  }, async (request, reply) => {
    const params = parseRequest(JobParamsSchema, 'params', request.params, reply);
    if (!params) return reply;
    const userId = callerId(request);
    if (!userId) return sendError(reply, 'UNAUTHORIZED');

    const job = await jobRepo.get(params.jobId);
    if (!job) {
      return sendError(reply, 'JOB_NOT_FOUND');
    }

    const skill = await catalog.getSkill(job.skillId);
    if (!skill || !(await catalog.canView(skill, userId))) {
      return sendError(reply, 'FORBIDDEN');
    }

    return toJobOut(job);
  });

  if (jobWorker) {
    app.addHook('onReady', async () => {
      await jobWorker.start();
    });
  }

  // Add cleanup on server close
  app.addHook('onClose', async () => {
    await jobWorker?.stop();
    await stores?.close();
  });

  return app;
}
