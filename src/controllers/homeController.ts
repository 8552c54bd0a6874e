import { withViewer } from '../middleware/auth.js';
import { Services } from '../services/index.js';

export const createHomeController = ({ graph, messages }: Services) => {
    // Feed for a logged-in viewer, landing data otherwise
    const home = withViewer(async (_req, res, viewer) => {
        if (viewer.kind === 'anonymous') {
            res.json({
                success: true,
                data: { authenticated: false, messages: [], likes: [] },
            });
            return;
        }

        const [feed, likes] = await Promise.all([
            graph.feedFor(viewer.user),
            graph.likedMessageIds(viewer.user.id),
        ]);

        res.json({
            success: true,
            data: {
                authenticated: true,
                messages: await messages.present(feed),
                likes,
            },
        });
    });

    return { home };
};
