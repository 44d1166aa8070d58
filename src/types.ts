export type RepoCoordinates = { owner: string; repo: string };

export type RepoAddress = RepoCoordinates & {
  fullName: string;
  path: string;
};

export type ContentType = "file" | "dir" | "symlink" | "submodule";

export type ContentEntry = {
  type: ContentType;
  name: string;
  path: string;
  sha: string;
  size: number;
  content?: string;
  encoding?: string;
  download_url?: string | null;
};

/** A single entry for a file path, an array for a directory. */
export type ContentListing = ContentEntry | ContentEntry[];

export type CommitResponse = {
  content: ContentEntry | null;
  commit: { sha: string; html_url?: string };
};

export type RepoResponse = {
  name: string;
  full_name: string;
  private: boolean;
  default_branch: string;
  owner: { login: string };
};

export type UserResponse = {
  login: string;
  name?: string | null;
};

export type BlobResponse = {
  content: string;
  encoding: "base64";
  size: number;
};

export type PutFileParams = {
  content: Uint8Array;
  message: string;
  sha?: string;
  branch?: string;
};

export type DeleteFileParams = {
  message: string;
  sha: string;
  branch?: string;
};

export interface GitHubApi {
  getAuthenticatedUser(): Promise<UserResponse>;
  getRepository(owner: string, repo: string): Promise<RepoResponse>;
  listRepositories(): Promise<RepoResponse[]>;
  getContents(
    owner: string,
    repo: string,
    path: string,
    ref?: string
  ): Promise<ContentListing>;
  getBlob(owner: string, repo: string, sha: string): Promise<BlobResponse>;
  putFile(
    owner: string,
    repo: string,
    path: string,
    params: PutFileParams
  ): Promise<CommitResponse>;
  deleteFile(
    owner: string,
    repo: string,
    path: string,
    params: DeleteFileParams
  ): Promise<CommitResponse>;
}

export type WriteOptions = {
  branch?: string;
  message?: string;
};
