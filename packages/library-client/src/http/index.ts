export { ApiRequester, errorForStatus, networkCause } from './api-requester.js';
export { RequestPacer } from './pacer.js';
