import { Request, Response, NextFunction } from 'express';
import { withUser, withViewer } from '../middleware/auth.js';
import { ANONYMOUS } from '../services/sessionService.js';
import { Services } from '../services/index.js';
import { parseId } from '../utils/params.js';
import { toAccountView, toUserSummary } from '../utils/serializers.js';
import { clearSessionCookie } from '../utils/sessionCookie.js';
import { UpdateProfileInput } from '../utils/validators.js';

export const createUserController = ({ users, graph, messages }: Services) => {
    // List users, optionally filtered by a username substring (?q=, matched as given)
    const listUsers = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const q = typeof req.query.q === 'string' ? req.query.q : undefined;
            const found = await users.listUsers(q);

            res.json({
                success: true,
                data: { users: found.map(toUserSummary) },
            });
        } catch (error) {
            next(error);
        }
    };

    const getProfile = withViewer(async (req, res, viewer) => {
        const id = parseId(req.params.id, 'User');
        const profile = await users.getProfile(id, viewer);

        res.json({
            success: true,
            data: {
                user: toUserSummary(profile.user),
                messages: await messages.present(profile.messages),
                stats: profile.stats,
                isFollowing: profile.isFollowing,
            },
        });
    });

    const getLikes = withUser(async (req, res, viewer) => {
        const user = await users.getUser(parseId(req.params.id, 'User'));
        const [liked, viewerLikes] = await Promise.all([
            graph.messagesLikedBy(user.id),
            graph.likedMessageIds(viewer.id),
        ]);

        res.json({
            success: true,
            data: {
                user: toUserSummary(user),
                messages: await messages.present(liked),
                likes: viewerLikes,
            },
        });
    });

    const getFollowing = withUser(async (req, res) => {
        const user = await users.getUser(parseId(req.params.id, 'User'));
        const following = await graph.followingOf(user.id);

        res.json({
            success: true,
            data: { user: toUserSummary(user), following: following.map(toUserSummary) },
        });
    });

    const getFollowers = withUser(async (req, res) => {
        const user = await users.getUser(parseId(req.params.id, 'User'));
        const followers = await graph.followersOf(user.id);

        res.json({
            success: true,
            data: { user: toUserSummary(user), followers: followers.map(toUserSummary) },
        });
    });

    const follow = withUser(async (req, res, user) => {
        const result = await graph.follow(user, parseId(req.params.id, 'User'));
        res.json({ success: true, data: result });
    });

    const stopFollowing = withUser(async (req, res, user) => {
        const result = await graph.unfollow(user, parseId(req.params.id, 'User'));
        res.json({ success: true, data: result });
    });

    const toggleLike = withUser(async (req, res, user) => {
        const result = await graph.toggleLike(user, parseId(req.params.id, 'Warble'));
        res.json({ success: true, data: result });
    });

    const updateProfile = withUser(async (req, res, user) => {
        const input: UpdateProfileInput = req.body;
        const updated = await users.updateProfile(user, input);

        res.json({
            success: true,
            data: {
                user: toAccountView(updated),
                message: 'Profile updated successfully!',
            },
        });
    });

    // Deleting the account also ends the session
    const deleteAccount = withUser(async (req, res, user) => {
        await users.deleteUser(user);
        clearSessionCookie(res);
        req.viewer = ANONYMOUS;

        res.json({
            success: true,
            data: { message: 'Account deleted.' },
        });
    });

    return {
        listUsers,
        getProfile,
        getLikes,
        getFollowing,
        getFollowers,
        follow,
        stopFollowing,
        toggleLike,
        updateProfile,
        deleteAccount,
    };
};
