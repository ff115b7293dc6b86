export { DEFAULT_GIT_COMMAND, detect, detectWithCommand } from "./detect.js";
export { DetectError, isDetectError } from "./errors.js";
export type { DetectErrorDetail, DetectErrorKind } from "./errors.js";
export {
	currentBranch,
	DEFAULT_REMOTE,
	expandScpUrl,
	remoteUrl,
	repositoryDir,
	resolveRemote,
	trackingBranch,
} from "./git/remote.js";
export {
	classify,
	detectServiceKind,
	SERVICE_LABELS,
	serviceBranch,
	serviceRepo,
	serviceUser,
} from "./git/service.js";
export { parseRemoteUrl } from "./git/url.js";
export type { ParsedRemoteUrl, UrlHost } from "./git/url.js";
export type {
	BitbucketService,
	GitHubEnterpriseService,
	GitHubService,
	GitLabService,
	GitService,
	RemoteIdentity,
	RepositoryRef,
	ServiceKind,
} from "./types/index.js";
