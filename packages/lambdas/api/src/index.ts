import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import {
  NotFoundError,
  PublishedProximity,
  StoreInsightsEngine,
  ValidationError,
  createStoreInsightsEngine,
} from '@store-insights/core';

export type ApiRequest = Pick<APIGatewayProxyEvent, 'httpMethod' | 'path' | 'queryStringParameters'>;

type Handler = (event: ApiRequest, context?: Pick<Context, 'awsRequestId'>) => Promise<APIGatewayProxyResult>;

const DEFAULT_FORECAST_DAYS = 5;

let sharedEngine: StoreInsightsEngine | null = null;

/**
 * Engine shared by warm invocations. The API only reads: jobs run in the
 * scheduler process, and what they publish is read back from the generations table.
 */
async function getEngine(): Promise<StoreInsightsEngine> {
  if (!sharedEngine) {
    sharedEngine = createStoreInsightsEngine();
  }
  return sharedEngine;
}

/**
 * Build the API handler around an engine source
 */
export function createApiHandler(engineSource: () => Promise<StoreInsightsEngine>): Handler {
  return async (event, context) => {
    console.log('API request:', {
      method: event.httpMethod,
      path: event.path,
      requestId: context?.awsRequestId,
    });

    try {
      // Handle CORS preflight requests
      if (event.httpMethod === 'OPTIONS') {
        return response(200, null);
      }

      const engine = await engineSource();
      const segments = event.path.split('/').filter(Boolean).map(decodeURIComponent);

      switch (segments[0]) {
        case 'stores':
          return await handleStores(engine, event, segments);
        case 'competitors':
          return await handleCompetitors(engine, event, segments);
        case 'proximity':
          return await handleProximity(engine, event, segments);
        case 'summary':
          return await handleSummary(engine, event, segments);
        case 'cities':
          return await handleCities(engine, event, segments);
      }

      return response(404, { error: 'Not found' });
    } catch (error) {
      if (error instanceof ValidationError) {
        return response(400, { error: error.message });
      }
      if (error instanceof NotFoundError) {
        return response(404, { error: error.message });
      }
      console.error('API error:', error);
      return response(500, { error: 'Internal server error' });
    }
  };
}

export const handler = createApiHandler(getEngine);

// ============ Stores ============

async function handleStores(
  engine: StoreInsightsEngine,
  event: ApiRequest,
  segments: string[]
): Promise<APIGatewayProxyResult> {
  if (event.httpMethod !== 'GET') {
    return response(405, { error: 'Method not allowed' });
  }

  const storeId: string | undefined = segments[1];
  const resource: string | undefined = segments[2];

  if (!storeId) {
    const stores = await engine.listStores({
      city: readStringParam(event, 'city'),
      state: readStringParam(event, 'state'),
    });
    return response(200, { items: stores, count: stores.length });
  }

  switch (resource) {
    case undefined:
      return response(200, await engine.getStore(storeId));

    case 'insights': {
      const insights = await engine.latestInsights(storeId);
      return response(200, { storeId, items: insights, count: insights.length });
    }

    case 'proximity': {
      const radiusKm = readNumberParam(event, 'radiusKm');
      return response(200, await engine.proximitySummary(storeId, radiusKm));
    }

    case 'weather':
      return response(200, await engine.weatherSummary(storeId));

    case 'forecast': {
      const days = readNumberParam(event, 'days') ?? DEFAULT_FORECAST_DAYS;
      return response(200, await engine.weatherForecast(storeId, days));
    }
  }

  return response(404, { error: 'Store endpoint not found' });
}

// ============ Competitors ============

async function handleCompetitors(
  engine: StoreInsightsEngine,
  event: ApiRequest,
  segments: string[]
): Promise<APIGatewayProxyResult> {
  if (event.httpMethod !== 'GET' || segments.length > 1) {
    return response(404, { error: 'Competitor endpoint not found' });
  }

  const competitors = await engine.listCompetitors({
    chain: readStringParam(event, 'chain'),
    city: readStringParam(event, 'city'),
  });
  return response(200, { items: competitors, count: competitors.length });
}

// ============ Proximity ============

async function handleProximity(
  engine: StoreInsightsEngine,
  event: ApiRequest,
  segments: string[]
): Promise<APIGatewayProxyResult> {
  if (event.httpMethod !== 'GET' || segments.length > 1) {
    return response(404, { error: 'Proximity endpoint not found' });
  }

  const generation = await engine.latestProximityGeneration();
  if (!generation) {
    return response(404, { error: 'No proximity generation published yet' });
  }
  return response(200, serializeGeneration(generation));
}

/**
 * Maps do not survive JSON.stringify; flatten records to an object keyed by store
 */
function serializeGeneration(generation: PublishedProximity) {
  return {
    generationId: generation.generationId,
    computedAt: generation.computedAt,
    radiusKm: generation.radiusKm,
    storeCount: generation.records.size,
    records: Object.fromEntries(generation.records),
  };
}

// ============ Summary ============

async function handleSummary(
  engine: StoreInsightsEngine,
  event: ApiRequest,
  segments: string[]
): Promise<APIGatewayProxyResult> {
  if (event.httpMethod === 'GET' && segments[1] === 'competition' && segments.length === 2) {
    return response(200, await engine.competitionSummary());
  }
  return response(404, { error: 'Summary endpoint not found' });
}

// ============ Cities ============

async function handleCities(
  engine: StoreInsightsEngine,
  event: ApiRequest,
  segments: string[]
): Promise<APIGatewayProxyResult> {
  const [, city, resource] = segments;
  if (event.httpMethod !== 'GET' || !city || resource !== 'stores') {
    return response(404, { error: 'City endpoint not found' });
  }

  return response(200, await engine.storesByCity(city));
}

// ============ Helpers ============

function readStringParam(event: ApiRequest, name: string): string | undefined {
  const raw = event.queryStringParameters?.[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

function readNumberParam(event: ApiRequest, name: string): number | undefined {
  const raw = event.queryStringParameters?.[name];
  if (raw === undefined || raw === '') return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function response(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      'Access-Control-Allow-Origin': '*',
      'Access-Control-Allow-Methods': 'GET, OPTIONS',
      'Access-Control-Allow-Headers': 'Content-Type, Authorization',
    },
    body: body ? JSON.stringify(body) : '',
  };
}
