/**
 * Model Conclave MCP server.
 * Query records and the cost ledger live under the configured data path.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerTools } from './tools/index.js';
import { registerResources } from './resources/index.js';
import type { Conclave } from './orchestrator.js';

const SERVER_INSTRUCTIONS = `Model Conclave answers questions with a council of language models.

Use **ask** for any question. The server decides how much deliberation it needs:

1. **Classify**: simple questions go to one backend; harder ones go to several.
2. **Augment**: workspace tools (search, calculator, code execution, document retrieval) run first when the question calls for them.
3. **Collect**: every selected backend answers independently.
4. **Rank**: backends rank each other's anonymized answers.
5. **Synthesize**: a chairman model merges the best answers.
6. **Judge** (optional): an independent model scores high-stakes answers.

Every model call passes a per-query and a daily budget check first. When a budget is exhausted, ask returns status "denied" and no cost is incurred.

Other tools:
- **classify**: see how a question would be routed without answering it
- **cost_summary**: spend per day, backend and stage
- **cache_stats**: response cache counters
- **get_query**: stored records of past questions

Workspaces (pass \`workspace\`) change which backends, tools and synthesis tier are used. Read conclave://workspaces for the list.`;

export function createServer(conclave: Conclave): McpServer {
  const server = new McpServer(
    {
      name: 'model-conclave',
      version: '0.3.0',
    },
    {
      capabilities: { tools: {}, resources: {}, logging: {} },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  registerTools(server, conclave);
  registerResources(server, conclave);

  return server;
}
