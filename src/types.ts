export interface GlobalOptions {
  dir?: string;
}

export interface AddOptions {
  service?: string;
  account?: string;
}

export interface GetOptions {
  reveal?: boolean;
}

export interface RemoveOptions {
  yes?: boolean;
}

export interface RestoreOptions {
  yes?: boolean;
}

export interface DeleteOptions {
  yes?: boolean;
  backup?: boolean;
}
