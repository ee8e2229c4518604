// src/lib/http.ts
import { NextResponse, type NextRequest } from 'next/server';
import { getConfig } from './config';
import { PlantServiceError, ok, fail, getErrorMessage, type PlantResult } from './errors';

/**
 * Reads the request body as JSON. An empty or malformed body is a validation failure.
 */
export async function readJsonBody(request: NextRequest): Promise<PlantResult<unknown>> {
  try {
    return ok(await request.json());
  } catch (error) {
    return fail(new PlantServiceError(getErrorMessage(error), 'VALIDATION', error));
  }
}

export const NOT_FOUND_BODY = { error: 'Plant not found' } as const;

export function jsonResponse(body: unknown, status: number): NextResponse {
  return new NextResponse(JSON.stringify(body, null, getConfig().jsonIndent), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** The single 404 shape, shared by unmatched routes and unknown ids. */
export const notFoundResponse = (): NextResponse => jsonResponse(NOT_FOUND_BODY, 404);

export const badRequestResponse = (messages: string[]): NextResponse =>
  jsonResponse({ errors: messages }, 400);

export const noContentResponse = (): NextResponse => new NextResponse(null, { status: 204 });

export function errorResponse(error: PlantServiceError): NextResponse {
  if (error.code === 'NOT_FOUND') {
    return notFoundResponse();
  }
  return badRequestResponse(error.details);
}
