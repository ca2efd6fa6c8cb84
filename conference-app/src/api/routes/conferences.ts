import type { FastifyInstance } from 'fastify';
import { ArgumentError, EntityNotFoundError, query, type Query } from '../../../../src/index.js';
import { conferenceEntity, type Conference } from '../../domain/conference.js';
import { findConferenceById, type ConferenceRepository } from '../../repositories/conference-repository.js';

interface ListQuerystring {
  where?: string;
  orderBy?: string;
  limit?: number;
  page?: number;
  pageSize?: number;
}

interface FilterQuerystring {
  where?: string;
}

interface IdParams {
  id: number;
}

interface ConferenceBody {
  name: string;
  location?: string | null;
  participantsNum?: number;
  status?: number;
  startDate: string;
  endDate?: string | null;
  tags?: string[];
}

const DEFAULT_PAGE_SIZE = 20;

const listQuerystringSchema = {
  type: 'object',
  properties: {
    where: { type: 'string' },
    orderBy: { type: 'string' },
    limit: { type: 'integer', minimum: 0 },
    page: { type: 'integer', minimum: 1 },
    pageSize: { type: 'integer', minimum: 1, maximum: 500 },
  },
} as const;

const filterQuerystringSchema = {
  type: 'object',
  properties: { where: { type: 'string' } },
} as const;

const idParamsSchema = {
  type: 'object',
  required: ['id'],
  properties: { id: { type: 'integer' } },
} as const;

const conferenceBodySchema = {
  type: 'object',
  required: ['name', 'startDate'],
  properties: {
    name: { type: 'string', minLength: 1 },
    location: { type: ['string', 'null'] },
    participantsNum: { type: 'integer', minimum: 0 },
    status: { type: 'integer', minimum: 0 },
    startDate: { type: 'string' },
    endDate: { type: ['string', 'null'] },
    tags: { type: 'array', items: { type: 'string' } },
  },
} as const;

function parseDate(argument: string, text: string): Date {
  const date = new Date(text);
  if (Number.isNaN(date.getTime())) {
    throw new ArgumentError(argument, `${argument} must be an ISO-8601 date, got '${text}'`);
  }
  return date;
}

function toConference(body: ConferenceBody, conferenceId: number): Conference {
  return conferenceEntity.materialize({
    conferenceId,
    name: body.name,
    location: body.location ?? null,
    participantsNum: body.participantsNum ?? 0,
    status: body.status ?? 0,
    startDate: parseDate('startDate', body.startDate),
    endDate: body.endDate == null ? null : parseDate('endDate', body.endDate),
    tags: body.tags ?? [],
  });
}

function buildQuery(qs: ListQuerystring): Query<Conference> {
  let q = query<Conference>();
  if (qs.where !== undefined && qs.where.trim() !== '') q = q.where(qs.where);
  if (qs.orderBy !== undefined && qs.orderBy.trim() !== '') q = q.orderBy(qs.orderBy);
  if (qs.limit !== undefined) q = q.take(qs.limit);
  return q;
}

function filterText(qs: FilterQuerystring): string | undefined {
  return qs.where !== undefined && qs.where.trim() !== '' ? qs.where : undefined;
}

export async function registerConferenceRoutes(app: FastifyInstance, repository: ConferenceRepository): Promise<void> {
  // GET /conferences: filtered, ordered list; a page parameter returns a Page
  app.get<{ Querystring: ListQuerystring }>(
    '/conferences',
    { schema: { querystring: listQuerystringSchema } },
    async (request, reply) => {
      const q = buildQuery(request.query);
      if (request.query.page !== undefined) {
        const page = await repository.findPage(q, request.query.page, request.query.pageSize ?? DEFAULT_PAGE_SIZE);
        return reply.status(200).send(page);
      }
      return reply.status(200).send(await repository.findAll(q));
    },
  );

  app.get<{ Querystring: FilterQuerystring }>(
    '/conferences/count',
    { schema: { querystring: filterQuerystringSchema } },
    async (request, reply) => {
      const count = await repository.count(filterText(request.query));
      return reply.status(200).send({ count });
    },
  );

  app.get<{ Querystring: FilterQuerystring }>(
    '/conferences/exists',
    { schema: { querystring: filterQuerystringSchema } },
    async (request, reply) => {
      const exists = await repository.exists(filterText(request.query) ?? 'true');
      return reply.status(200).send({ exists });
    },
  );

  app.get<{ Params: IdParams }>(
    '/conferences/:id',
    { schema: { params: idParamsSchema } },
    async (request, reply) => {
      const conference = await findConferenceById(repository, request.params.id);
      if (conference === null) throw new EntityNotFoundError(conferenceEntity.name, request.params.id);
      return reply.status(200).send(conference);
    },
  );

  app.post<{ Body: ConferenceBody }>(
    '/conferences',
    { schema: { body: conferenceBodySchema } },
    async (request, reply) => {
      const created = await repository.create(toConference(request.body, 0));
      return reply.status(201).send(created);
    },
  );

  app.put<{ Params: IdParams; Body: ConferenceBody }>(
    '/conferences/:id',
    { schema: { params: idParamsSchema, body: conferenceBodySchema } },
    async (request, reply) => {
      const updated = await repository.update(toConference(request.body, request.params.id));
      return reply.status(200).send(updated);
    },
  );

  app.delete<{ Params: IdParams }>(
    '/conferences/:id',
    { schema: { params: idParamsSchema } },
    async (request, reply) => {
      await repository.delete(conferenceEntity.materialize({ conferenceId: request.params.id }));
      return reply.status(204).send();
    },
  );

  // DELETE /conferences?where=...: bulk delete; an empty filter is refused
  app.delete<{ Querystring: FilterQuerystring }>(
    '/conferences',
    { schema: { querystring: filterQuerystringSchema } },
    async (request, reply) => {
      const where = filterText(request.query);
      if (where === undefined) {
        throw new ArgumentError('where', 'DELETE /conferences requires a where filter');
      }
      const deleted = await repository.deleteWhere(where);
      return reply.status(200).send({ deleted });
    },
  );
}
