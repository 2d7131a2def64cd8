export { createResolveRouter } from './resolve.js';
export { createSearchRouter } from './search.js';
export { createDownloadRouter } from './download.js';
export { createStatusRouter } from './status.js';
