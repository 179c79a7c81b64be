import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Account API',
      version: '1.0.0',
      description: 'REST API for managing the current user account',
    },
    servers: [
      {
        url: 'http://localhost:3000',
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
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'INVALID_PASSWORD',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Incorrect password',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
        UserDTO: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            login: { type: 'string' },
            firstName: { type: 'string', nullable: true },
            lastName: { type: 'string', nullable: true },
            email: { type: 'string', format: 'email' },
            imageUrl: { type: 'string', nullable: true },
            activated: { type: 'boolean' },
            langKey: { type: 'string', example: 'en' },
            address: { type: 'string', nullable: true },
            phoneNumber: { type: 'string', nullable: true },
            identityCardNumber: { type: 'string', nullable: true },
            createdDate: { type: 'string', format: 'date-time' },
            lastModifiedDate: { type: 'string', format: 'date-time' },
            authorities: { type: 'array', items: { type: 'string' }, example: ['ROLE_USER'] },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Registration and authentication' },
      { name: 'Account', description: "Current user's account" },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
