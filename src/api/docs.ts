// GET /docs: OpenAPI description of the profile routes (no API key required)

import { Hono } from 'hono';

const nullableString = { type: 'string', nullable: true } as const;
const errorResponse = (description: string) => ({
  description,
  content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
});
const jsonResponse = (description: string, schema: string) => ({
  description,
  content: { 'application/json': { schema: { $ref: `#/components/schemas/${schema}` } } },
});

export const openApiDocument = {
  openapi: '3.0.3',
  info: {
    title: 'Persona Profiles API',
    version: '1.0.0',
    description: 'Manage user profiles and LLM-generated AI persona profiles',
  },
  components: {
    securitySchemes: {
      apiKey: { type: 'apiKey', in: 'header', name: 'X-API-KEY' },
    },
    schemas: {
      Error: {
        type: 'object',
        properties: { error: { type: 'string' } },
        required: ['error'],
      },
      UserInput: {
        type: 'object',
        required: ['user_id'],
        properties: {
          user_id: { type: 'integer' },
          display_name: nullableString,
          name: { type: 'string' },
          bio: nullableString,
          location: nullableString,
          profile_pic_url: nullableString,
        },
      },
      User: {
        type: 'object',
        properties: {
          user_id: { type: 'integer' },
          display_name: nullableString,
          name: { type: 'string' },
          bio: nullableString,
          location: nullableString,
          profile_pic_url: nullableString,
          created_at: { type: 'string', format: 'date-time' },
        },
      },
      UserUpsertResult: {
        type: 'object',
        properties: {
          message: { type: 'string' },
          user_id: { type: 'integer' },
          action: { type: 'string', enum: ['created', 'updated'] },
        },
      },
      AIInput: {
        type: 'object',
        required: ['content_id'],
        properties: {
          content_id: { type: 'integer' },
          profile_pic_url: nullableString,
        },
      },
      AIProfile: {
        type: 'object',
        properties: {
          ai_id: { type: 'integer' },
          content_id: { type: 'integer' },
          display_name: nullableString,
          name: nullableString,
          bio: nullableString,
          location: nullableString,
          profile_pic_url: nullableString,
          systems_instructions: nullableString,
          created_at: { type: 'string', format: 'date-time' },
        },
      },
      AIUpsertResult: {
        type: 'object',
        properties: {
          message: { type: 'string' },
          ai_id: { type: 'integer' },
          content_id: { type: 'integer' },
          action: { type: 'string', enum: ['created', 'updated'] },
        },
      },
    },
  },
  security: [{ apiKey: [] }],
  paths: {
    '/api/users': {
      post: {
        operationId: 'create_or_update_user',
        summary: 'Create or update a user profile',
        requestBody: {
          required: true,
          content: { 'application/json': { schema: { $ref: '#/components/schemas/UserInput' } } },
        },
        responses: {
          200: jsonResponse('Updated', 'UserUpsertResult'),
          201: jsonResponse('Created', 'UserUpsertResult'),
          400: errorResponse('Missing user_id or invalid body'),
          401: errorResponse('Missing or invalid API key'),
          500: errorResponse('Internal error'),
        },
      },
    },
    '/api/users/{user_id}': {
      get: {
        operationId: 'get_user',
        summary: 'Get a user profile by user_id',
        parameters: [{ name: 'user_id', in: 'path', required: true, schema: { type: 'integer' } }],
        responses: {
          200: jsonResponse('User profile', 'User'),
          401: errorResponse('Missing or invalid API key'),
          404: errorResponse('User not found'),
        },
      },
    },
    '/api/ais': {
      post: {
        operationId: 'create_or_update_ai',
        summary: 'Generate and store the AI profile for a content item',
        parameters: [{ name: 'X-Correlation-ID', in: 'header', required: false, schema: { type: 'string' } }],
        requestBody: {
          required: true,
          content: { 'application/json': { schema: { $ref: '#/components/schemas/AIInput' } } },
        },
        responses: {
          200: jsonResponse('Updated', 'AIUpsertResult'),
          201: jsonResponse('Created', 'AIUpsertResult'),
          400: errorResponse('Missing content_id or invalid body'),
          401: errorResponse('Missing or invalid API key'),
          404: errorResponse('Content not found upstream'),
          500: errorResponse('Generation or internal failure'),
        },
      },
    },
    '/api/ais/content/{content_id}': {
      get: {
        operationId: 'get_ai_by_content',
        summary: 'Get the AI profile for a content item',
        parameters: [{ name: 'content_id', in: 'path', required: true, schema: { type: 'integer' } }],
        responses: {
          200: jsonResponse('AI profile', 'AIProfile'),
          401: errorResponse('Missing or invalid API key'),
          404: errorResponse('AI profile not found'),
        },
      },
    },
  },
};

export function createDocsRoutes() {
  const app = new Hono();
  app.get('/', (c) => c.json(openApiDocument));
  return app;
}
