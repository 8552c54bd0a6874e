import { AccountView, IMessage, IUser, MessageView, UserSummary } from '../types/index.js';

export const toUserSummary = (user: IUser): UserSummary => ({
    id: user.id,
    username: user.username,
    imageUrl: user.imageUrl,
    headerImageUrl: user.headerImageUrl,
    bio: user.bio,
    location: user.location,
});

export const toAccountView = (user: IUser): AccountView => ({
    ...toUserSummary(user),
    email: user.email,
});

export const toMessageView = (message: IMessage, author?: IUser): MessageView => ({
    id: message.id,
    text: message.text,
    timestamp: message.timestamp,
    userId: message.userId,
    author: author ? toUserSummary(author) : null,
});
