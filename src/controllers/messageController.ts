import { Request, Response, NextFunction } from 'express';
import { withUser } from '../middleware/auth.js';
import { Services } from '../services/index.js';
import { parseId } from '../utils/params.js';
import { NewMessageInput } from '../utils/validators.js';

export const createMessageController = ({ messages }: Services) => {
    const createMessage = withUser(async (req, res, user) => {
        const { text }: NewMessageInput = req.body;
        const message = await messages.postMessage(user, text);
        const [view] = await messages.present([message]);

        res.status(201).json({
            success: true,
            data: { message: view },
        });
    });

    const getMessage = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const message = await messages.getMessage(parseId(req.params.id, 'Warble'));
            const [view] = await messages.present([message]);

            res.json({
                success: true,
                data: { message: view },
            });
        } catch (error) {
            next(error);
        }
    };

    const deleteMessage = withUser(async (req, res, user) => {
        await messages.deleteMessage(user, parseId(req.params.id, 'Warble'));

        res.json({
            success: true,
            data: { message: 'Warble deleted.' },
        });
    });

    return { createMessage, getMessage, deleteMessage };
};
