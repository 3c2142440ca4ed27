export { users, keywords, excludedWords, userModes } from './users.js';
export { userProducts } from './products.js';
