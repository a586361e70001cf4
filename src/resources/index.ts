/**
 * MCP Resource registrations — read-only data endpoints.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Conclave } from '../orchestrator.js';

function json(uri: URL, value: unknown) {
  return { contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify(value, null, 2) }] };
}

export function registerResources(server: McpServer, conclave: Conclave): void {

  server.resource('costs', 'conclave://costs', { description: 'Daily spend against the budget for the last 7 days', mimeType: 'application/json' }, async (uri) => {
    return json(uri, conclave.costReport(7));
  });

  server.resource('backends', 'conclave://backends', { description: 'Registered backends, prices and API key availability', mimeType: 'application/json' }, async (uri) => {
    const backends = conclave.backends();
    return json(uri, {
      total: backends.length,
      available: backends.filter((b) => b.available).length,
      backends: backends.map((b) => ({
        backend_id: b.backend_id,
        display_name: b.display_name,
        provider: b.provider,
        cost_input_per_mtok: b.cost_input_per_mtok,
        cost_output_per_mtok: b.cost_output_per_mtok,
        general_purpose: b.general_purpose,
        available: b.available,
      })),
      roles: conclave.config.roles,
    });
  });

  server.resource('workspaces', 'conclave://workspaces', { description: 'Workspace profiles: backends per complexity, tools, RAG and synthesis tier', mimeType: 'application/json' }, async (uri) => {
    return json(uri, {
      default_tier: conclave.config.synthesis.default_tier,
      workspaces: conclave.workspaceProfiles(),
    });
  });
}
