import logger from '../config/logger.js';
import { createError } from '../middleware/errorHandler.js';
import { countCharacters, MESSAGE_MAX_LENGTH } from '../models/Message.js';
import { DataStore } from '../repositories/types.js';
import { IMessage, IUser, MessageView } from '../types/index.js';
import { toMessageView } from '../utils/serializers.js';

export class MessageService {
    constructor(private readonly store: DataStore) {}

    async postMessage(author: IUser, text: string): Promise<IMessage> {
        const length = countCharacters(text);
        if (length < 1 || length > MESSAGE_MAX_LENGTH) {
            throw createError.messageTooLong();
        }

        const message = await this.store.transaction((tx) =>
            tx.messages.create({ userId: author.id, text, timestamp: new Date() })
        );
        logger.info('Message posted', { messageId: message.id, userId: author.id });
        return message;
    }

    async getMessage(id: number): Promise<IMessage> {
        const message = await this.store.messages.findById(id);
        if (!message) {
            throw createError.messageNotFound();
        }
        return message;
    }

    // Only the owner may delete; likes on the message go with it
    async deleteMessage(requester: IUser, id: number): Promise<void> {
        await this.store.transaction(async (tx) => {
            const message = await tx.messages.findById(id);
            if (!message) {
                throw createError.messageNotFound();
            }
            if (message.userId !== requester.id) {
                throw createError.notOwner('warbles');
            }

            await tx.likes.deleteByMessages([message.id]);
            await tx.messages.delete(message.id);
        });
        logger.info('Message deleted', { messageId: id, userId: requester.id });
    }

    // Attaches author summaries, keeping the order of `messages`
    async present(messages: IMessage[]): Promise<MessageView[]> {
        const authorIds = [...new Set(messages.map((message) => message.userId))];
        const authors = await this.store.users.findByIds(authorIds);
        const byId = new Map(authors.map((author) => [author.id, author]));
        return messages.map((message) => toMessageView(message, byId.get(message.userId)));
    }
}
