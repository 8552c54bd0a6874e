import { Services } from '../../src/services/index.js';
import { IUser } from '../../src/types/index.js';

export const PASSWORD = 'password123';

export const signupUser = (services: Services, username: string): Promise<IUser> =>
    services.auth.signup({
        username,
        email: `${username}@example.com`,
        password: PASSWORD,
        imageUrl: undefined,
    });
