export { SysmlApiClient, type SysmlApiClientConfig, type SysmlCredentials, type FetchElementsOptions } from './client.js';
export { UndiciTransport, type HttpTransport, type HttpRequest, type HttpResponse, type UndiciTransportConfig } from './transport.js';
export { projectSchema, branchSchema, type Project, type Branch } from './api-types.js';
export {
  matchByName,
  selectCommit,
  selectProject,
  type CommitSelector,
  type ProjectSelector,
} from './selection.js';
export { SysmlModelSource, type SysmlModelSourceConfig, type ResolvedModel } from './source.js';
