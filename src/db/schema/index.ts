export * from './users.js';
export * from './friend-requests.js';
export * from './friends.js';
export * from './conversations.js';
export * from './participants.js';
export * from './messages.js';
export * from './last-messages.js';
export * from './files.js';
