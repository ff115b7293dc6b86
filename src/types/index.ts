export type ServiceKind = "github" | "github-enterprise" | "gitlab" | "bitbucket";
export type OutputMode = "default" | "json" | "quiet";

export interface RepositoryRef {
	readonly user: string;
	readonly repo: string;
	readonly branch?: string;
}

export interface GitHubService extends RepositoryRef {
	readonly kind: "github";
}

export interface GitHubEnterpriseService extends RepositoryRef {
	readonly kind: "github-enterprise";
}

export interface GitLabService extends RepositoryRef {
	readonly kind: "gitlab";
}

export interface BitbucketService extends RepositoryRef {
	readonly kind: "bitbucket";
}

export type GitService = GitHubService | GitHubEnterpriseService | GitLabService | BitbucketService;

/** Remote URL and branch read from a working copy, before classification. */
export interface RemoteIdentity {
	remoteUrl: string;
	branch?: string;
}

export interface GitContext {
	command: string;
	dir: string;
}

export interface TrackingRef {
	remote: string;
	branch?: string;
}

export interface GitServiceConfig {
	git: string;
	output: OutputMode;
}
