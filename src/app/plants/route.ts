// src/app/plants/route.ts
import type { NextRequest } from 'next/server';
import { getDb } from '@/lib/db/client';
import { perfLog } from '@/lib/perf-log';
import { jsonResponse, errorResponse, readJsonBody } from '@/lib/http';
import { listPlants, createPlant } from '@/services/server/plant-service';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  const startTime = performance.now();
  console.log('🌱 [API] GET /plants - Listing plants');

  const plants = await listPlants(await getDb());

  perfLog(`✅ GET - ${plants.length} plants`, startTime);
  return jsonResponse(plants, 200);
}

export async function POST(request: NextRequest) {
  const startTime = performance.now();
  console.log('🌱 [API] POST /plants - Creating plant');

  const body = await readJsonBody(request);
  if (!body.ok) {
    console.warn('⚠️  [API] Unreadable body:', body.error.message);
    perfLog('❌ POST - Invalid body', startTime);
    return errorResponse(body.error);
  }

  const result = await createPlant(await getDb(), body.value);
  if (!result.ok) {
    console.warn('⚠️  [API] Plant rejected:', result.error.details);
    perfLog('❌ POST - Rejected', startTime);
    return errorResponse(result.error);
  }

  perfLog('✅ POST - Total', startTime);
  console.log('✅ [API] Plant created:', result.value.id);
  return jsonResponse(result.value, 201);
}
