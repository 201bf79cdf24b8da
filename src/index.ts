#!/usr/bin/env node
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from "./config.js";
import { getModeScale, getModeScaleSchema } from "./tools/get-mode-scale.js";
import { getModeChords, getModeChordsSchema } from "./tools/get-mode-chords.js";
import { getChordTable, getChordTableSchema } from "./tools/get-chord-table.js";
import { generateChordMidi, generateChordMidiSchema } from "./tools/generate-chord-midi.js";

const config = loadConfig();

const server = new Server(
  { name: "modal-chords", version: "1.0.0" },
  { capabilities: { tools: {} } }
);

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: [getModeScaleSchema, getModeChordsSchema, getChordTableSchema, generateChordMidiSchema],
}));

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  switch (request.params.name) {
    case "get_mode_scale":
      return getModeScale(request.params.arguments, config);
    case "get_mode_chords":
      return getModeChords(request.params.arguments);
    case "get_chord_table":
      return getChordTable(request.params.arguments);
    case "generate_chord_midi":
      return generateChordMidi(request.params.arguments, config);
    default:
      throw new Error(`Unknown tool: ${request.params.name}`);
  }
});

// Start server. stdout carries the protocol, so logs go to stderr
const transport = new StdioServerTransport();
await server.connect(transport);
console.error(`modal-chords MCP server running on stdio (MIDI output: ${config.outputDir})`);
