/**
 * Statuspage webhook listener
 *
 * Route handlers take a Web `Request` and return a `Response`, so they can be
 * tested directly and mounted behind any server that speaks the Fetch API.
 */

import { z } from 'zod';
import { FALLBACK_PRODUCT_LABEL } from '../config/products';
import { detectProduct } from '../detection/product-detector';
import type { IncidentLog } from '../storage/incident-log';
import type { IncidentRecord } from '../types/incident';
import { logger } from '../utils/logger';
import { formatTimestamp, parseDate } from '../utils/time';

export const WEBHOOK_PATH = '/webhooks/openai-status';

function isEmptyObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length === 0;
}

const incidentUpdateSchema = z.object({
  id: z.string().optional(),
  body: z.string().nullish(),
  status: z.string().optional(),
  created_at: z.string().optional()
}).passthrough();

const incidentSchema = z.object({
  id: z.string().optional(),
  name: z.string().default('Unknown incident'),
  status: z.string().default('unknown'),
  impact: z.string().nullish(),
  shortlink: z.string().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
  incident_updates: z.array(incidentUpdateSchema).nullish()
}).passthrough();

const payloadSchema = z.object({
  page: z.object({
    id: z.string().optional(),
    status_indicator: z.string().optional(),
    status_description: z.string().nullish()
  }).passthrough().nullish(),
  // An empty incident object carries nothing to report; treat it as missing
  incident: z.preprocess(value => (isEmptyObject(value) ? undefined : value), incidentSchema.nullish())
}).passthrough();

export type StatuspageIncident = z.infer<typeof incidentSchema>;
export type StatuspagePayload = z.infer<typeof payloadSchema>;

export interface WebhookDependencies {
  log: IncidentLog;
  secret?: string;
  detect?: (text: string) => string | null;
  now?: () => Date;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Body of the most recent incident update. Statuspage lists updates in
 * chronological order, so the last element is the latest.
 */
export function extractLatestUpdate(incident: StatuspageIncident): string {
  const updates = incident.incident_updates ?? [];
  const latest = updates[updates.length - 1];
  if (!latest) {
    return `Incident status: ${incident.status}`;
  }
  return latest.body || `Incident status: ${latest.status ?? 'unknown'}`;
}

export function describeStatus(payload: StatuspagePayload, incident: StatuspageIncident): string {
  const pageDescription = payload.page?.status_description;
  if (pageDescription) return pageDescription;
  if (incident.impact) return `${capitalize(incident.impact)} impact`;
  return capitalize(incident.status);
}

export function formatLogLine(product: string, statusDescription: string, latestBody: string, at: Date): string {
  return [
    `[${formatTimestamp(at)}] Product: ${product}`,
    `Status: ${statusDescription} - ${latestBody}`,
    '-'.repeat(80)
  ].join('\n');
}

function isAuthorized(request: Request, secret: string | undefined): boolean {
  if (!secret) return true;
  const header = request.headers.get('authorization');
  if (header === `Bearer ${secret}`) return true;
  return new URL(request.url).searchParams.get('token') === secret;
}

export function handleHealthcheck(): Response {
  return Response.json({ ok: true, message: 'Status monitor is running' });
}

export async function handleStatusWebhook(request: Request, deps: WebhookDependencies): Promise<Response> {
  if (!isAuthorized(request, deps.secret)) {
    return Response.json({ error: 'Unauthorized' }, { status: 401 });
  }

  let json: unknown;
  try {
    json = await request.json();
  } catch {
    return Response.json({ detail: 'Invalid JSON' }, { status: 400 });
  }

  const parsed = payloadSchema.safeParse(json);
  if (!parsed.success) {
    return Response.json({ detail: 'Invalid payload' }, { status: 400 });
  }

  const payload = parsed.data;
  const incident = payload.incident;
  if (!incident) {
    return Response.json({ detail: 'No incident object in payload' }, { status: 400 });
  }

  const now = deps.now ? deps.now() : new Date();
  const latestBody = extractLatestUpdate(incident);
  const statusDescription = describeStatus(payload, incident);
  const product = (deps.detect ?? detectProduct)(`${incident.name} ${latestBody}`);

  logger.info(formatLogLine(product ?? FALLBACK_PRODUCT_LABEL, statusDescription, latestBody, now));

  if (!product) {
    return Response.json({ ok: true, recorded: false });
  }

  const updates = incident.incident_updates ?? [];
  const latestUpdate = updates[updates.length - 1];
  const incidentId = incident.id ?? incident.name;
  const updateKey = latestUpdate?.id ?? String(updates.length);
  const published = parseDate(latestUpdate?.created_at) ?? parseDate(incident.updated_at) ?? now;

  const record: IncidentRecord = {
    entry_id: `webhook:${incidentId}:${updateKey}`,
    timestamp: formatTimestamp(published),
    product,
    event: incident.name,
    status: `${statusDescription} - ${latestBody}`,
    phase: latestUpdate?.status ? capitalize(latestUpdate.status) : capitalize(incident.status),
    url: incident.shortlink,
    published_at: published.toISOString(),
    detected_at: now.toISOString(),
    source: 'webhook'
  };

  try {
    const recorded = await deps.log.append(record);
    return Response.json({ ok: true, recorded, product });
  } catch (error) {
    logger.error('Failed to record webhook incident', error);
    return Response.json({ error: 'Internal server error' }, { status: 500 });
  }
}

/**
 * Dispatch a request to the matching handler.
 */
export async function routeRequest(request: Request, deps: WebhookDependencies): Promise<Response> {
  const { pathname } = new URL(request.url);

  if (pathname === '/') {
    return request.method === 'GET' || request.method === 'HEAD'
      ? handleHealthcheck()
      : Response.json({ error: 'Method not allowed' }, { status: 405 });
  }

  if (pathname === WEBHOOK_PATH) {
    return request.method === 'POST'
      ? handleStatusWebhook(request, deps)
      : Response.json({ error: 'Method not allowed' }, { status: 405 });
  }

  return Response.json({ error: 'Not found' }, { status: 404 });
}
