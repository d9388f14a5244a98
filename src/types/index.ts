// Core type definitions for the image builder

export interface ImageFilterConfig {
  with_selector: string[];
  most_recent?: boolean;
}

export type CommunicatorType = 'ssh' | 'winrm' | 'none';

export interface CommunicatorConfig {
  type: CommunicatorType;
  username?: string;
  port?: number;
  /** Connect window in milliseconds */
  timeout?: number;
  retry_interval?: number;
  ssh_private_key_file?: string;
  /** Filled from ssh_private_key_file by the loader */
  ssh_private_key?: string;
  password?: string;
  winrm_use_ssl?: boolean;
}

export type RescuePollBudget = 'fresh' | 'remaining';

export interface BuilderConfig {
  token: string;
  endpoint?: string;

  /** Milliseconds between status queries, shared by every wait */
  poll_interval?: number;
  /** Deadline for a single provider action, in milliseconds */
  action_timeout?: number;
  /** Deadline for the whole build, in milliseconds */
  build_timeout?: number;

  server_name?: string;
  location: string;
  server_type: string;
  server_labels?: Record<string, string>;
  upgrade_server_type?: string;
  image?: string;
  image_filter?: ImageFilterConfig;

  snapshot_name?: string;
  snapshot_labels?: Record<string, string>;
  user_data?: string;
  user_data_file?: string;
  ssh_keys?: string[];
  ssh_keys_labels?: Record<string, string>;

  networks?: number[];
  firewalls?: number[];
  volumes?: number[];
  public_ipv4?: number;
  public_ipv4_disabled?: boolean;
  public_ipv6?: number;
  public_ipv6_disabled?: boolean;

  rescue?: string;
  rescue_poll_budget?: RescuePollBudget;

  keep_server?: boolean;
  skip_snapshot?: boolean;
  force?: boolean;
  halt_after?: string;

  communicator?: CommunicatorConfig;
}

export interface BuildErrorReport {
  code: string;
  message: string;
  step?: string;
  details?: unknown;
  remediation?: string;
}

export interface BuildArtifact {
  /** Absent when skip_snapshot was set */
  imageId?: number;
  imageName?: string;
  /** Final server state, present only when keep_server was set */
  server?: {
    id: number;
    name: string;
    status: string;
    publicIPv4?: string;
    publicIPv6?: string;
  };
}

export interface BuildMetadata {
  buildId: string;
  timestamp: Date;
  duration?: number;
  location: string;
  serverName: string;
}

export interface BuildResult {
  success: boolean;
  artifact?: BuildArtifact;
  errors?: BuildErrorReport[];
  metadata: BuildMetadata;
}

/** Configuration after naming defaults are applied; what the steps run against */
export type ResolvedBuilderConfig = BuilderConfig & {
  server_name: string;
  snapshot_name: string;
};
