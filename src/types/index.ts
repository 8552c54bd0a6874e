// User types
export interface IUser {
    id: number;
    email: string;
    username: string;
    passwordHash: string;
    imageUrl: string;
    headerImageUrl: string;
    bio: string | null;
    location: string | null;
    createdAt: Date;
}

// Public projection of a user: never carries the credential or the email
export interface UserSummary {
    id: number;
    username: string;
    imageUrl: string;
    headerImageUrl: string;
    bio: string | null;
    location: string | null;
}

// What the account owner sees about themselves
export interface AccountView extends UserSummary {
    email: string;
}

// Message ("warble") types
export interface IMessage {
    id: number;
    text: string;
    timestamp: Date;
    userId: number;
}

export interface MessageView {
    id: number;
    text: string;
    timestamp: Date;
    userId: number;
    author: UserSummary | null;
}

// Directed edge: follower -> followed
export interface IFollow {
    followerId: number;
    followedId: number;
}

export interface ILike {
    userId: number;
    messageId: number;
}

// Session identity resolved once per request
export type Viewer =
    | { kind: 'anonymous' }
    | { kind: 'authenticated'; user: IUser };

export interface SessionPayload {
    userId: number;
}

export interface ProfileStats {
    messages: number;
    following: number;
    followers: number;
    likes: number;
}

export interface FollowResult {
    following: boolean;
    changed: boolean;
}

export interface LikeResult {
    liked: boolean;
}

declare global {
    namespace Express {
        interface Request {
            correlationId?: string;
            viewer?: Viewer;
        }
    }
}
