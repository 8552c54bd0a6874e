import { DataStore } from '../repositories/types.js';
import { AuthService } from './authService.js';
import { GraphService } from './graphService.js';
import { MessageService } from './messageService.js';
import { SessionService } from './sessionService.js';
import { UserService } from './userService.js';

export interface Services {
    auth: AuthService;
    sessions: SessionService;
    users: UserService;
    messages: MessageService;
    graph: GraphService;
}

export const createServices = (store: DataStore): Services => {
    const auth = new AuthService(store);
    return {
        auth,
        sessions: new SessionService(store),
        users: new UserService(store, auth),
        messages: new MessageService(store),
        graph: new GraphService(store),
    };
};
