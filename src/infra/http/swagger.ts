import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Mini Market API',
      version: '1.0.0',
      description: 'REST API for the Mini Market storefront',
    },
    servers: [
      {
        url: 'http://localhost:8000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        Credentials: {
          type: 'object',
          required: ['identity', 'password'],
          properties: {
            identity: {
              type: 'string',
              minLength: 3,
              maxLength: 254,
              description: 'Username or email',
              example: 'alice',
            },
            password: { type: 'string', example: 'Secr3t!' },
          },
        },
        UserSummary: {
          type: 'object',
          required: ['userId', 'identity'],
          properties: {
            userId: { type: 'string', format: 'uuid' },
            identity: { type: 'string' },
          },
        },
        LoginResponse: {
          type: 'object',
          required: ['token', 'tokenType', 'expiresAt', 'userId', 'identity'],
          properties: {
            token: { type: 'string' },
            tokenType: { type: 'string', enum: ['Bearer'] },
            expiresAt: { type: 'string', format: 'date-time' },
            userId: { type: 'string', format: 'uuid' },
            identity: { type: 'string' },
          },
        },
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'AUTH_FAILURE',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Invalid identity or password',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Registration, login and token handling' },
      { name: 'Health', description: 'Service health' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts', './src/infra/http/app.ts'],
};

/**
 * Collect the `@openapi` blocks from the route sources into one document.
 */
export function buildSwaggerSpec(): Record<string, unknown> {
  return Object.fromEntries(Object.entries(swaggerJsdoc(options)));
}
