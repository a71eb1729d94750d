/**
 * Fastify JSON API for the catalog, ingestion queue and job registry
 */

import Fastify, { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fastifyStatic from '@fastify/static';
import { z } from 'zod';
import { CatalogErrorKind, NotFoundError, ValidationError, errorMessage, isCatalogError } from '../../lib/errors';
import { CategoryFieldSchema, MediaTableSchema, SearchFieldSchema } from '../../lib/media-types';
import { logger as rootLogger } from '../../utils/logger';
import { CatalogContext } from '../context';
import { SyncDirectionSchema } from '../jobs/directory-sync';
import { validateBaseName } from '../jobs/job-naming';
import { JobStateSchema } from '../jobs/job-types';

const logger = rootLogger.child('http');

export const SESSION_HEADER = 'x-session-id';
export const DEFAULT_SESSION = 'local';

export interface CatalogServerOptions {
  context: CatalogContext;
  port?: number;
  host?: string;
  /** Serve depot files under /depot/. */
  serveDepot?: boolean;
}

const STATUS_BY_KIND: Record<CatalogErrorKind, number> = {
  validation: 400,
  authorization: 403,
  'not-found': 404,
  conflict: 409,
};

const optionalText = z.preprocess(value => (value === '' ? undefined : value), z.string().optional());

const SearchQuerySchema = z.object({
  db_table: MediaTableSchema.default('media_proj'),
  search_query: optionalText,
  filter_field: z.preprocess(value => (value === '' ? undefined : value), SearchFieldSchema.optional()),
  file_type: optionalText,
  genre: optionalText,
  view: z.preprocess(value => (value === '' ? undefined : value), z.string().default('grid')),
  page: z.coerce.number().int().default(1),
});

const CategoryQuerySchema = z.object({
  db_table: MediaTableSchema.default('media_proj'),
  category: CategoryFieldSchema,
  top: z.coerce.number().int().positive().optional(),
});

const TableParamsSchema = z.object({ table: MediaTableSchema });
const AssetParamsSchema = z.object({ table: MediaTableSchema, fileId: z.string().min(1) });
const FileIdParamsSchema = z.object({ fileId: z.string().min(1) });
const FileIdBodySchema = z.object({ file_id: z.string().min(1) });

const CartIdsSchema = z.object({
  db_table: MediaTableSchema,
  file_ids: z.array(z.string().min(1)),
});
const CartClearSchema = z.object({ db_table: MediaTableSchema });
const CartUpdateSchema = z.object({
  db_table: MediaTableSchema,
  password: z.string().optional(),
  changes: z.array(z.object({ file_id: z.string().min(1), field: z.string(), value: z.string() })).default([]),
});
const CartPruneSchema = z.object({
  db_table: MediaTableSchema,
  password: z.string().optional(),
  file_ids: z.array(z.string().min(1)).default([]),
});

const IngestFilesSchema = z.object({ paths: z.array(z.string().min(1)).min(1) });
const IngestFolderSchema = z.object({ path: z.string().min(1) });
const IngestIndexSchema = z.object({ index: z.number().int().min(0) });
const IngestProcessSchema = IngestIndexSchema.extend({ operation_id: z.string().regex(/^copy_\d+$/).optional() });
const IngestSubmitSchema = IngestIndexSchema.extend({ fields: z.record(z.string()).default({}) });
const IngestClearSchema = z.object({ completed_only: z.boolean().default(false) });
const IndexParamsSchema = z.object({ index: z.coerce.number().int().min(0) });
const CopyParamsSchema = z.object({ copyId: z.string().min(1) });

const YearParamsSchema = z.object({ year: z.string().regex(/^\d{4}$/) });
const JobNameParamsSchema = z.object({ jobName: z.string().min(1) });
const AppParamsSchema = z.object({ app: z.string().min(1) });
const JobValidateSchema = z.object({ job_base: z.string() });
const JobCreateSchema = z.object({
  job_base: z.string(),
  revision: z.string().optional(),
  apps: z.array(z.string()).optional(),
  tags: z.union([z.string(), z.array(z.string())]).optional(),
  notes: z.string().optional(),
  due_date: z.string().optional(),
  charges: z.array(z.string()).max(3).optional(),
});
const JobLookupSchema = z.object({ job_path: z.string().min(1) });
const JobUpdateSchema = z.object({ changes: z.record(z.string()) });
const JobStateBodySchema = z.object({ state: JobStateSchema });
const DirectionQuerySchema = z.object({ direction: SyncDirectionSchema.default('NETWORK_TO_LOCAL') });

export class CatalogServer {
  private server: FastifyInstance;
  private options: Required<Omit<CatalogServerOptions, 'context'>> & { context: CatalogContext };

  constructor(options: CatalogServerOptions) {
    this.options = {
      port: options.context.config.server.port,
      host: options.context.config.server.host,
      serveDepot: true,
      ...options,
    };

    this.server = Fastify({
      logger: false,
    });

    this.setupErrorHandling();
    this.setupRoutes();
  }

  get instance(): FastifyInstance {
    return this.server;
  }

  private get context(): CatalogContext {
    return this.options.context;
  }

  private setupErrorHandling(): void {
    this.server.setErrorHandler((error, request, reply) => {
      if (isCatalogError(error)) {
        return reply.status(STATUS_BY_KIND[error.kind]).send({ success: false, error: error.message });
      }
      if (error.validation) {
        return reply.status(400).send({ success: false, error: error.message });
      }
      if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
        return reply.status(error.statusCode).send({ success: false, error: error.message });
      }
      logger.error('Request failed', { url: request.url, error: error.message });
      return reply.status(500).send({ success: false, error: 'Internal server error' });
    });
  }

  private setupRoutes(): void {
    if (this.options.serveDepot) {
      this.server.register(fastifyStatic, {
        root: this.context.config.depotRoot,
        prefix: '/depot/',
      });
    }

    // API: Health check
    this.server.get('/api/health', async () => ({ status: 'ok' }));

    this.setupCatalogRoutes();
    this.setupCartRoutes();
    this.setupIngestRoutes();
    this.setupJobRoutes();
  }

  private setupCatalogRoutes(): void {
    const { queryBuilder, store, decorator, config } = this.context;

    this.server.get('/api/search', async request => {
      const query = parseInput(SearchQuerySchema, request.query);
      return queryBuilder.search({
        table: query.db_table,
        query: query.search_query,
        field: query.filter_field,
        fileType: query.file_type,
        genre: query.genre,
        view: query.view,
        page: query.page,
      });
    });

    this.server.get('/api/categories', async request => {
      const query = parseInput(CategoryQuerySchema, request.query);
      const counts = store.countByCategory(query.db_table, query.category, query.top ?? config.settings.topCategories);
      return {
        table: query.db_table,
        category: query.category,
        counts: [...counts].map(([value, count]) => ({ value, count })),
      };
    });

    this.server.get('/api/assets/:table/:fileId', async request => {
      const params = parseInput(AssetParamsSchema, request.params);
      const asset = store.get(params.table, params.fileId);
      if (!asset) throw new NotFoundError(`Asset ${params.fileId} not found in ${params.table}`, 'asset');
      return decorator.decorate(asset);
    });

    this.server.get('/api/status/:fileId', async request => {
      const params = parseInput(FileIdParamsSchema, request.params);
      return store.fileStatus(params.fileId);
    });

    this.server.post('/api/archive/copy', async (request, reply) => {
      const body = parseInput(FileIdBodySchema, request.body);
      return sendResult(reply, store.copyToArchive(body.file_id));
    });
  }

  private setupCartRoutes(): void {
    const { sessions, store, decorator, cartEditor } = this.context;

    this.server.get('/api/cart/:table', async request => {
      const { table } = parseInput(TableParamsSchema, request.params);
      const ids = sessions.get(sessionIdOf(request)).cart.get(table);
      return { table, count: ids.length, items: decorator.decorateAll(store.getMany(table, ids)) };
    });

    this.server.post('/api/cart/add', async request => {
      const body = parseInput(CartIdsSchema, request.body);
      const sessionId = sessionIdOf(request);
      const state = sessions.get(sessionId);
      const added = state.cart.add(body.db_table, body.file_ids);
      sessions.put(sessionId, state);
      return { success: true, added, count: state.cart.count(body.db_table) };
    });

    this.server.post('/api/cart/remove', async request => {
      const body = parseInput(CartIdsSchema, request.body);
      const sessionId = sessionIdOf(request);
      const state = sessions.get(sessionId);
      const removed = state.cart.remove(body.db_table, body.file_ids);
      sessions.put(sessionId, state);
      return { success: true, removed, count: state.cart.count(body.db_table) };
    });

    this.server.post('/api/cart/clear', async request => {
      const body = parseInput(CartClearSchema, request.body);
      const sessionId = sessionIdOf(request);
      const state = sessions.get(sessionId);
      state.cart.clear(body.db_table);
      sessions.put(sessionId, state);
      return { success: true, count: 0 };
    });

    this.server.post('/api/cart/update', async (request, reply) => {
      const body = parseInput(CartUpdateSchema, request.body);
      const changes = body.changes.map(change => ({ fileId: change.file_id, field: change.field, value: change.value }));
      return sendResult(reply, cartEditor.updateItems(body.db_table, changes, body.password));
    });

    this.server.post('/api/cart/prune', async (request, reply) => {
      const body = parseInput(CartPruneSchema, request.body);
      return sendResult(reply, cartEditor.pruneItems(body.db_table, body.file_ids, body.password));
    });
  }

  private setupIngestRoutes(): void {
    const queueFor = (request: FastifyRequest) => this.context.ingestQueue(sessionIdOf(request));

    this.server.get('/api/ingest/queue', async request => {
      const queue = queueFor(request);
      const state = queue.state;
      return { items: state.items, cursor: state.cursor, undoDepth: state.undoStack.length, stats: queue.stats() };
    });

    this.server.post('/api/ingest/files', async request => {
      const body = parseInput(IngestFilesSchema, request.body);
      return { success: true, ...(await queueFor(request).addFiles(body.paths)) };
    });

    this.server.post('/api/ingest/folder', async request => {
      const body = parseInput(IngestFolderSchema, request.body);
      return { success: true, ...(await queueFor(request).addFolder(body.path)) };
    });

    this.server.post('/api/ingest/process', async request => {
      const body = parseInput(IngestProcessSchema, request.body);
      const item = await queueFor(request).process(body.index, { operationId: body.operation_id });
      return { success: item.status !== 'Error', copyId: item.copyId, item };
    });

    this.server.post('/api/ingest/process-all', async request => ({ success: true, stats: await queueFor(request).processAll() }));

    this.server.get('/api/ingest/draft/:index', async request => {
      const { index } = parseInput(IndexParamsSchema, request.params);
      return { index, fields: queueFor(request).draft(index) };
    });

    this.server.post('/api/ingest/submit', async (request, reply) => {
      const body = parseInput(IngestSubmitSchema, request.body);
      return sendResult(reply, queueFor(request).submit(body.index, body.fields));
    });

    this.server.post('/api/ingest/skip', async request => {
      const body = parseInput(IngestIndexSchema, request.body);
      return { success: true, item: queueFor(request).skip(body.index) };
    });

    this.server.post('/api/ingest/retry', async request => {
      const body = parseInput(IngestIndexSchema, request.body);
      return { success: true, item: queueFor(request).retry(body.index) };
    });

    this.server.post('/api/ingest/remove', async request => {
      const body = parseInput(IngestIndexSchema, request.body);
      return { success: true, item: queueFor(request).remove(body.index) };
    });

    this.server.post('/api/ingest/undo', async (request, reply) => sendResult(reply, await queueFor(request).undo()));

    this.server.post('/api/ingest/clear', async request => {
      const body = parseInput(IngestClearSchema, request.body ?? {});
      const queue = queueFor(request);
      const removed = body.completed_only ? queue.clearCompleted() : queue.clear();
      return { success: true, removed };
    });

    this.server.get('/api/ingest/progress/:copyId', async request => {
      const { copyId } = parseInput(CopyParamsSchema, request.params);
      const progress = this.context.progress.take(copyId);
      if (!progress) throw new NotFoundError(`No copy operation ${copyId}`, 'copy');
      return progress;
    });
  }

  private setupJobRoutes(): void {
    const { jobs } = this.context;

    this.server.get('/api/jobs/years', async () => ({ years: jobs.years() }));

    this.server.get('/api/jobs/projects/:year', async request => {
      const { year } = parseInput(YearParamsSchema, request.params);
      return { year, projects: jobs.projectsForYear(year) };
    });

    this.server.get('/api/jobs/apps/:jobName', async request => {
      const { jobName } = parseInput(JobNameParamsSchema, request.params);
      return { jobName, apps: jobs.appsForProject(jobName) };
    });

    this.server.get('/api/jobs/subdirs/:app', async request => {
      const { app } = parseInput(AppParamsSchema, request.params);
      return { app, subdirs: jobs.subdirsForApp(app) };
    });

    this.server.post('/api/jobs/validate', async request => {
      const body = parseInput(JobValidateSchema, request.body);
      const check = validateBaseName(body.job_base);
      return check.valid ? { ...check, next: jobs.nextJobName(body.job_base) } : { ...check, next: null };
    });

    this.server.post('/api/jobs', async (request, reply) => {
      const body = parseInput(JobCreateSchema, request.body);
      const result = await jobs.createJob({
        base: body.job_base,
        revision: body.revision,
        apps: body.apps,
        tags: body.tags,
        notes: body.notes,
        dueDate: body.due_date,
        charges: body.charges ? [body.charges[0], body.charges[1], body.charges[2]] : undefined,
      });
      if (result.success) reply.status(201);
      return sendResult(reply, result);
    });

    this.server.get('/api/jobs/lookup', async request => {
      const { job_path } = parseInput(JobLookupSchema, request.query);
      const job = jobs.findJob({ jobPath: job_path });
      if (!job) throw new NotFoundError(`No job at ${job_path}`, 'job');
      return job;
    });

    this.server.get('/api/jobs/:jobName', async request => {
      const { jobName } = parseInput(JobNameParamsSchema, request.params);
      const job = jobs.findJob({ jobName });
      if (!job) throw new NotFoundError(`Job not found: ${jobName}`, 'job');
      return job;
    });

    this.server.patch('/api/jobs/:jobName', async request => {
      const { jobName } = parseInput(JobNameParamsSchema, request.params);
      const body = parseInput(JobUpdateSchema, request.body);
      return { success: true, job: jobs.updateJob(jobName, body.changes) };
    });

    this.server.post('/api/jobs/:jobName/state', async request => {
      const { jobName } = parseInput(JobNameParamsSchema, request.params);
      const body = parseInput(JobStateBodySchema, request.body);
      return { success: true, job: jobs.setState(jobName, body.state) };
    });

    this.server.get('/api/jobs/:jobName/sync-paths', async request => {
      const { jobName } = parseInput(JobNameParamsSchema, request.params);
      const { direction } = parseInput(DirectionQuerySchema, request.query);
      return jobs.syncPaths(jobName, direction);
    });

    this.server.post('/api/jobs/:jobName/sync', async request => {
      const { jobName } = parseInput(JobNameParamsSchema, request.params);
      const { direction } = parseInput(DirectionQuerySchema, request.body ?? {});
      return jobs.syncJob(jobName, direction);
    });
  }

  async start(): Promise<void> {
    try {
      await this.server.listen({
        port: this.options.port,
        host: this.options.host,
      });

      logger.info(`Catalog server started at http://${this.options.host}:${this.options.port}`);
    } catch (error) {
      logger.error('Failed to start catalog server', { error: errorMessage(error) });
      throw new Error(`Failed to start server: ${errorMessage(error)}`);
    }
  }

  async stop(): Promise<void> {
    try {
      await this.server.close();
      logger.info('Catalog server stopped');
    } catch (error) {
      logger.error('Error stopping server', { error: errorMessage(error) });
    }
  }
}

function parseInput<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ');
    throw new ValidationError(issues);
  }
  return parsed.data;
}

function sessionIdOf(request: FastifyRequest): string {
  const header = request.headers[SESSION_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value || DEFAULT_SESSION;
}

type ResultLike = { success: true } | { success: false; error: string; kind?: CatalogErrorKind };

function sendResult<T extends ResultLike>(reply: FastifyReply, result: T): T {
  const outcome: ResultLike = result;
  if (!outcome.success) {
    reply.status(outcome.kind ? STATUS_BY_KIND[outcome.kind] : 400);
  }
  return result;
}
