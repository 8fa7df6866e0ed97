#!/usr/bin/env node
// src/mcp.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { createRequire } from 'node:module';
import { anonymizeFile, anonymizeText } from './anonymize.js';
import { DEFAULT_MAX_SHIFT_DAYS } from './config.js';
import { DEFAULT_DATE_FORMAT } from './dates/format.js';
import { errorMessage } from './errors.js';
import { createRecordingLogger } from './log.js';

const require = createRequire(import.meta.url);
const { version: PACKAGE_VERSION } = require('../package.json') as { version: string };

function textResult(data: unknown) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(data) }],
  };
}

function errorResult(prefix: string, err: unknown) {
  return {
    content: [{ type: 'text' as const, text: `${prefix}: ${errorMessage(err)}` }],
    isError: true,
  };
}

const shiftSettingsShape = {
  maxShiftDays: z
    .number()
    .optional()
    .describe(`Maximum number of days to shift each date by, in either direction (default ${DEFAULT_MAX_SHIFT_DAYS})`),
  seed: z.number().optional().describe('Random seed. The same seed and input always give the same output. Omit for a fresh random run'),
  dateFormat: z
    .string()
    .optional()
    .describe(`strftime-style format used to parse and render dates (default "${DEFAULT_DATE_FORMAT}"). Only YYYY-MM-DD shaped text is scanned`),
};

export function createMcpServer(): McpServer {
  const server = new McpServer({
    name: 'dateshift',
    version: PACKAGE_VERSION,
  });

  // --- dateshift_text ---
  server.registerTool(
    'dateshift_text',
    {
      description:
        'Anonymize dates in a piece of text by shifting every YYYY-MM-DD date a random number of days. ' +
        'Returns { text, matched, shifted, skipped, warnings }. Dates that do not parse are left as they are.',
      inputSchema: {
        text: z.string().describe('Text to anonymize'),
        ...shiftSettingsShape,
      },
      annotations: {
        readOnlyHint: true,
        openWorldHint: false,
      },
    },
    async ({ text, maxShiftDays, seed, dateFormat }) => {
      const logger = createRecordingLogger();
      try {
        const result = anonymizeText(text, { maxShiftDays, seed, dateFormat, logger });
        return textResult({
          text: result.text,
          matched: result.matched,
          shifted: result.shifted,
          skipped: result.skipped,
          warnings: logger.messages.filter(m => m.level !== 'info').map(m => m.message),
        });
      } catch (err) {
        return errorResult('Anonymization failed', err);
      }
    },
  );

  // --- dateshift_file ---
  server.registerTool(
    'dateshift_file',
    {
      description:
        'Anonymize dates in a text file and write the result to another file, keeping its encoding. ' +
        'Returns the run summary { inputFile, outputFile, encoding, lines, matched, shifted, skipped, warnings }.',
      inputSchema: {
        inputFile: z.string().describe('Path of the file to read'),
        outputFile: z.string().describe('Path to write the anonymized copy to'),
        ...shiftSettingsShape,
        encoding: z.string().optional().describe('Input encoding (e.g. "utf-8", "windows-1252"). Detected when omitted'),
      },
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        openWorldHint: false,
      },
    },
    async ({ inputFile, outputFile, maxShiftDays, seed, dateFormat, encoding }) => {
      const logger = createRecordingLogger();
      try {
        const result = await anonymizeFile({ inputFile, outputFile, maxShiftDays, seed, dateFormat, encoding, logger });
        return textResult({
          ...result,
          warnings: logger.messages.filter(m => m.level !== 'info').map(m => m.message),
        });
      } catch (err) {
        return errorResult('Anonymization failed', err);
      }
    },
  );

  return server;
}

// --- stdio entry point ---
// Only start when run directly (not imported for testing)
const _argv1 = (process.argv[1] || '').replace(/\\/g, '/');
const isMainModule = _argv1.endsWith('/mcp.ts') ||
  _argv1.endsWith('/mcp.js') ||
  _argv1.endsWith('/dateshift-mcp');

if (isMainModule) {
  const server = createMcpServer();
  const transport = new StdioServerTransport();
  server.connect(transport).catch((err: unknown) => {
    console.error('MCP server failed to start:', err);
    process.exit(1);
  });
}
