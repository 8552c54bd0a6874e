import swaggerJsdoc from 'swagger-jsdoc';
import config from './index.js';

const options: swaggerJsdoc.Options = {
    definition: {
        openapi: '3.0.0',
        info: {
            title: 'Warbler API',
            version: '1.0.0',
            description: 'Short messages, follows and likes',
        },
        servers: [
            {
                url: '/api',
                description: 'API Server',
            },
        ],
        components: {
            securitySchemes: {
                cookieAuth: {
                    type: 'apiKey',
                    in: 'cookie',
                    name: config.session.cookieName,
                    description: 'Signed session token stored in an httpOnly cookie',
                },
            },
            schemas: {
                Error: {
                    type: 'object',
                    properties: {
                        success: { type: 'boolean', example: false },
                        error: {
                            type: 'object',
                            properties: {
                                code: { type: 'string', example: 'UNAUTHORIZED' },
                                message: { type: 'string', example: 'Access unauthorized.' },
                            },
                        },
                    },
                },
                User: {
                    type: 'object',
                    properties: {
                        id: { type: 'integer' },
                        username: { type: 'string' },
                        imageUrl: { type: 'string' },
                        headerImageUrl: { type: 'string' },
                        bio: { type: 'string', nullable: true },
                        location: { type: 'string', nullable: true },
                    },
                },
                Message: {
                    type: 'object',
                    properties: {
                        id: { type: 'integer' },
                        text: { type: 'string', maxLength: 140 },
                        timestamp: { type: 'string', format: 'date-time' },
                        userId: { type: 'integer' },
                        author: { $ref: '#/components/schemas/User' },
                    },
                },
            },
        },
        security: [{ cookieAuth: [] }],
    },
    apis: ['./src/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);

export default swaggerSpec;
