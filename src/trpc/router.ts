import { router } from './init.js';
import { authRouter } from './routers/auth.js';
import { usersRouter } from './routers/users.js';
import { friendsRouter } from './routers/friends.js';
import { conversationsRouter } from './routers/conversations.js';
import { messagesRouter } from './routers/messages.js';
import { filesRouter } from './routers/files.js';

export const appRouter = router({
  auth: authRouter,
  users: usersRouter,
  friends: friendsRouter,
  conversations: conversationsRouter,
  messages: messagesRouter,
  files: filesRouter,
});

export type AppRouter = typeof appRouter;
