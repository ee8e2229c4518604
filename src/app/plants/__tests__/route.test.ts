// src/app/plants/__tests__/route.test.ts
import { describe, it, expect } from 'vitest';
import { NextRequest } from 'next/server';
import { GET, POST } from '../route';

function postRequest(body: string) {
  return new NextRequest('http://localhost:5555/plants', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

const aloe = { name: 'Aloe', image: 'aloe.jpg', price: 15 };

describe('GET /plants', () => {
  it('should return an empty array for an empty store', async () => {
    const response = await GET();

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual([]);
  });

  it('should return every created plant', async () => {
    await POST(postRequest(JSON.stringify(aloe)));
    await POST(postRequest(JSON.stringify({ name: 'Fern', image: 'fern.png', price: 9.5, is_in_stock: false })));

    const response = await GET();
    const data = await response.json();

    expect(response.status).toBe(200);
    expect(data).toEqual([
      { id: 1, name: 'Aloe', image: 'aloe.jpg', price: 15, is_in_stock: true },
      { id: 2, name: 'Fern', image: 'fern.png', price: 9.5, is_in_stock: false },
    ]);
  });

  it('should pretty-print JSON by default', async () => {
    await POST(postRequest(JSON.stringify(aloe)));

    const response = await GET();
    const text = await response.text();

    expect(response.headers.get('content-type')).toBe('application/json');
    expect(text.split('\n')[1]).toBe('  {');
  });
});

describe('POST /plants', () => {
  it('should create a plant and default is_in_stock to true', async () => {
    const response = await POST(postRequest(JSON.stringify(aloe)));

    expect(response.status).toBe(201);
    expect(await response.json()).toEqual({
      id: 1,
      name: 'Aloe',
      image: 'aloe.jpg',
      price: 15,
      is_in_stock: true,
    });
  });

  it('should ignore a client-supplied id', async () => {
    const response = await POST(postRequest(JSON.stringify({ ...aloe, id: 42 })));
    const data = await response.json();

    expect(response.status).toBe(201);
    expect(data.id).toBe(1);
  });

  it('should return 400 when name is missing and persist nothing', async () => {
    const response = await POST(postRequest(JSON.stringify({ image: 'aloe.jpg', price: 15 })));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ errors: ['name: Required'] });

    const list = await GET();
    expect(await list.json()).toEqual([]);
  });

  it('should reject a price given as a string', async () => {
    const response = await POST(postRequest(JSON.stringify({ ...aloe, price: '15' })));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      errors: ['price: Expected number, received string'],
    });
  });

  it('should return 400 for a malformed JSON body', async () => {
    const response = await POST(postRequest('{"name": "Aloe"'));
    const data = await response.json();

    expect(response.status).toBe(400);
    expect(data.errors).toHaveLength(1);
    expect(typeof data.errors[0]).toBe('string');
  });

  it('should return 400 when the body is not an object', async () => {
    const response = await POST(postRequest(JSON.stringify([aloe])));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ errors: ['Expected object, received array'] });
  });
});
