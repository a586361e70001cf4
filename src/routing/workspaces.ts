/**
 * Workspace profiles: which backends serve each complexity, which tools a
 * workspace may use, whether it has documents to retrieve from, and its
 * default synthesis tier.
 */

import type { ConclaveConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';
import type { WorkspaceProfile } from '../types/index.js';

export const DEFAULT_WORKSPACE = 'General';

export interface WorkspaceDirectory {
  /** Unknown names resolve to the default workspace. */
  profile(workspace: string): WorkspaceProfile;
  list(): WorkspaceProfile[];
}

export class ConfigWorkspaceDirectory implements WorkspaceDirectory {
  private profiles = new Map<string, WorkspaceProfile>();

  constructor(workspaces: ConclaveConfig['workspaces']) {
    for (const [name, w] of Object.entries(workspaces)) {
      this.profiles.set(name, {
        name,
        description: w.description,
        backends: {
          simple: [...w.backends.simple],
          moderate: [...w.backends.moderate],
          complex: [...w.backends.complex],
          expert: [...w.backends.expert],
        },
        tools: [...w.tools],
        rag_enabled: w.rag_enabled,
        synthesis_tier: w.synthesis_tier,
      });
    }
  }

  profile(workspace: string): WorkspaceProfile {
    const found = this.profiles.get(workspace) ?? this.profiles.get(DEFAULT_WORKSPACE);
    if (!found) throw new ConfigurationError(`No "${DEFAULT_WORKSPACE}" workspace configured`);
    return found;
  }

  list(): WorkspaceProfile[] {
    return [...this.profiles.values()];
  }
}
