export { normalizeTopic, DEFAULT_TOPIC_NAMESPACE } from './normalize.js';
export type { Tweet } from './tweet.js';
export { encodeTweet, decodeTweet } from './tweet.js';
