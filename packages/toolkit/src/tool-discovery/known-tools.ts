import { z } from 'zod';
import knownToolsData from './known-tools.json';

const TOOL_NAME_PATTERN = /^[A-Za-z0-9_.+-]+$/;

const knownToolsSchema = z.object({
  tools: z.record(z.string().regex(TOOL_NAME_PATTERN), z.string().min(1)),
  coreTools: z.array(z.string().regex(TOOL_NAME_PATTERN)),
  formatHints: z.record(z.string().startsWith('.'), z.array(z.string().min(1))),
});

export type KnownTools = z.infer<typeof knownToolsSchema>;

// Names are interpolated into the probe command, hence the strict pattern.
export const KNOWN_TOOLS: KnownTools = knownToolsSchema.parse(knownToolsData);
