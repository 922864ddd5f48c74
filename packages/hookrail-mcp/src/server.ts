import path from "node:path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import {
  PACKET_STATUSES,
  cancelLoop,
  confirmFile,
  createPacket,
  errorMessage,
  findActivePacket,
  initProject,
  loadPacket,
  loopStatus,
  openControl,
  pauseLoop,
  restartLoop,
  resumeLoop,
  snapshotPacket,
  startLoop,
  updatePacket,
  type ControlContext,
  type Env,
  type Logger,
} from "hookrail-hook";

/**
 * hookrail control server
 *
 * The hooks only react to host events. Everything that starts or steers state from outside an
 * event (loops, packets, confirmed files) goes through these tools, against the same files the
 * hooks read.
 *
 * IMPORTANT: This is an STDIO MCP server.
 * Never write to stdout except MCP JSON-RPC. Logs go to stderr.
 */

export const SERVER_NAME = "hookrail";
export const SERVER_VERSION = "0.1.0";

export type ServerOptions = {
  env: Env;
  cwd: () => string;
  logger: Logger;
};

function ok(payload: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
}

function fail(err: unknown): CallToolResult {
  return { isError: true, content: [{ type: "text", text: `❌ ${errorMessage(err)}` }] };
}

const loopId = z.string().min(1).optional().describe("Loop id. Defaults to the foreground loop.");
const sectionMap = z.record(z.string()).describe("Section title → markdown body.");

export function createServer(options: ServerOptions): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  async function withControl(action: (ctx: ControlContext) => Promise<unknown>): Promise<CallToolResult> {
    try {
      const ctx = await openControl(options.cwd(), options.env, options.logger);
      return ok(await action(ctx));
    } catch (err) {
      options.logger.warn({ err: errorMessage(err) }, "control action failed");
      return fail(err);
    }
  }

  server.registerTool(
    "hookrail_init_project",
    {
      description: "Create the .hookrail marker so hooks and tools resolve this directory as the project root.",
      inputSchema: {
        dir: z.string().min(1).optional().describe("Directory to initialize. Defaults to the server's working directory."),
      },
    },
    async ({ dir }) => {
      try {
        const target = dir ? path.resolve(options.cwd(), dir) : options.cwd();
        return ok(await initProject(target));
      } catch (err) {
        return fail(err);
      }
    },
  );

  server.registerTool(
    "hookrail_loop_start",
    {
      description:
        "Start a loop: the directive is re-delivered at every Stop until the output carries <promise>PROMISE</promise> " +
        "or the iteration budget runs out. The new loop takes the foreground; the previous one is paused.",
      inputSchema: {
        directive: z.string().min(1).describe("Instruction re-delivered verbatim on each continuation."),
        completion_promise: z.string().min(1).describe("Text expected inside <promise>…</promise> when done."),
        max_iterations: z.number().int().min(0).optional().describe("0 = unbounded."),
        packet_id: z.string().min(1).optional(),
        session_id: z.string().min(1).optional().describe("Bind the loop to one host session."),
        promise_match: z.enum(["strict", "fuzzy"]).optional(),
      },
    },
    async ({ directive, completion_promise, max_iterations, packet_id, session_id, promise_match }) =>
      withControl((ctx) =>
        startLoop(
          ctx.paths,
          {
            directive,
            completionPromise: completion_promise,
            maxIterations: max_iterations,
            sourcePacketId: packet_id,
            sessionId: session_id,
            promiseMatch: promise_match,
          },
          ctx.loopDefaults,
          ctx.logger,
        ),
      ),
  );

  server.registerTool(
    "hookrail_loop_pause",
    { description: "Pause a loop. Stop events leave a paused loop untouched.", inputSchema: { loop_id: loopId } },
    async ({ loop_id }) => withControl((ctx) => pauseLoop(ctx.paths, loop_id, ctx.logger)),
  );

  server.registerTool(
    "hookrail_loop_resume",
    { description: "Resume a paused loop and bring it to the foreground.", inputSchema: { loop_id: loopId } },
    async ({ loop_id }) => withControl((ctx) => resumeLoop(ctx.paths, loop_id, ctx.logger)),
  );

  server.registerTool(
    "hookrail_loop_cancel",
    { description: "Cancel a loop. Cancelled is terminal.", inputSchema: { loop_id: loopId } },
    async ({ loop_id }) => withControl((ctx) => cancelLoop(ctx.paths, loop_id, ctx.logger)),
  );

  server.registerTool(
    "hookrail_loop_restart",
    {
      description: "Reset a loop to iteration 0, mark it active and bring it to the foreground.",
      inputSchema: { loop_id: loopId },
    },
    async ({ loop_id }) => withControl((ctx) => restartLoop(ctx.paths, loop_id, ctx.logger)),
  );

  server.registerTool(
    "hookrail_loop_status",
    { description: "Show the foreground pointer, one loop, and every known loop.", inputSchema: { loop_id: loopId } },
    async ({ loop_id }) => withControl((ctx) => loopStatus(ctx.paths, loop_id, ctx.logger)),
  );

  server.registerTool(
    "hookrail_packet_create",
    {
      description: "Create a handoff packet. Active packets collect relevant-file observations.",
      inputSchema: {
        purpose: z.string().min(1),
        status: z.enum(PACKET_STATUSES).default("active"),
        sections: sectionMap.optional(),
      },
    },
    async ({ purpose, status, sections }) => withControl((ctx) => createPacket(ctx.paths, { purpose, status, sections })),
  );

  server.registerTool(
    "hookrail_packet_update",
    {
      description: "Update a packet's status, purpose or prose sections. The id never changes.",
      inputSchema: {
        packet_id: z.string().min(1),
        status: z.enum(PACKET_STATUSES).optional(),
        purpose: z.string().min(1).optional(),
        sections: sectionMap.optional().describe("Replace these sections."),
        append: sectionMap.optional().describe("Append to these sections."),
      },
    },
    async ({ packet_id, status, purpose, sections, append }) =>
      withControl((ctx) => updatePacket(ctx.paths, packet_id, { status, purpose, sections, append }, ctx.logger)),
  );

  server.registerTool(
    "hookrail_packet_snapshot",
    {
      description: "Write the current confirmed and suggested file sets into a packet. Defaults to the active packet.",
      inputSchema: { packet_id: z.string().min(1).optional() },
    },
    async ({ packet_id }) =>
      withControl(async (ctx) => {
        const id = packet_id ?? (await findActivePacket(ctx.paths, ctx.logger))?.id;
        if (!id) throw new Error("No packet id given and no active packet exists");
        return snapshotPacket(ctx.paths, id, ctx.logger);
      }),
  );

  server.registerTool(
    "hookrail_file_confirm",
    {
      description: "Record that a file is relevant (user-confirmed). Attached to the given or active packet.",
      inputSchema: {
        file_path: z.string().min(1).describe("Absolute or project-relative path."),
        packet_id: z.string().min(1).optional(),
      },
    },
    async ({ file_path, packet_id }) =>
      withControl(async (ctx) => {
        if (packet_id && !(await loadPacket(ctx.paths, packet_id, ctx.logger))) {
          throw new Error(`Unknown packet: ${packet_id}`);
        }
        const packet = packet_id ?? (await findActivePacket(ctx.paths, ctx.logger))?.id ?? null;
        return confirmFile(ctx.paths, file_path, packet);
      }),
  );

  return server;
}
