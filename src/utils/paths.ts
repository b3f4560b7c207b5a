import path from "node:path";
import os from "node:os";

export const WORKSPACE_DIR_NAME = ".kforge";

/** Resolve .kforge/ inside the kernel tree */
export function getWorkspaceDir(root?: string): string {
  return path.join(root ?? process.cwd(), WORKSPACE_DIR_NAME);
}

/** Resolve a path relative to the .kforge/ workspace */
export function workspacePath(relative: string, root?: string): string {
  return path.join(getWorkspaceDir(root), relative);
}

/** User-global config, ~/.kforge/config.yaml */
export function userConfigPath(homeDir?: string): string {
  return path.join(homeDir ?? os.homedir(), WORKSPACE_DIR_NAME, "config.yaml");
}
