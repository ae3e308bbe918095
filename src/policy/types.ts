/**
 * A byte window of a remote file: skip `skip` bytes, then read `read` bytes.
 */
export interface PolicyWindow {
  skip: number;
  read: number;
}

export interface PolicyDefinition {
  default: PolicyWindow;
  extensions?: Record<string, PolicyWindow>;
}
