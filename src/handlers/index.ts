export { handleSourceInvocation, toSourceBody, type SourceInvocationBody } from './source';
export { handleMasterInvocation, createDispatcher, type MasterInvocationBody } from './master';
export type { HandlerDependencies, HandlerResponse, NoticeBody } from './types';
