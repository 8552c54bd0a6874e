import dotenv from 'dotenv';

dotenv.config();

interface Config {
    env: string;
    port: number;
    clientUrl: string;
    mongodb: {
        uri: string;
    };
    session: {
        secret: string;
        maxAgeSeconds: number;
        cookieName: string;
    };
    cookie: {
        secret: string;
    };
    security: {
        bcryptRounds: number;
    };
    defaults: {
        imageUrl: string;
        headerImageUrl: string;
    };
    pagination: {
        messageLimit: number;
    };
}

const config: Config = {
    env: process.env.NODE_ENV || 'development',
    port: parseInt(process.env.PORT || '5000', 10),
    clientUrl: process.env.CLIENT_URL || 'http://localhost:3000',
    mongodb: {
        // Transactions need a replica set, even a single-node one
        uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/warbler?replicaSet=rs0',
    },
    session: {
        secret: process.env.SESSION_SECRET || 'dev_session_secret',
        maxAgeSeconds: parseInt(process.env.SESSION_MAX_AGE || '604800', 10), // 7 days
        cookieName: 'session',
    },
    cookie: {
        secret: process.env.COOKIE_SECRET || 'dev_cookie_secret',
    },
    security: {
        bcryptRounds: parseInt(process.env.BCRYPT_ROUNDS || '12', 10),
    },
    defaults: {
        imageUrl: '/static/images/default-pic.png',
        headerImageUrl: '/static/images/warbler-hero.jpg',
    },
    pagination: {
        messageLimit: 100,
    },
};

export default config;
