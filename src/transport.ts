import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express, {
	type ErrorRequestHandler,
	type Request,
	type RequestHandler,
	type Response,
} from "express";
import { z } from "zod";
import type { Config } from "./config.js";
import { loadConfig } from "./config.js";
import { logger } from "./logger.js";
import {
	type EngineSettings,
	bibliographyOperation,
	bibliographyRequestShape,
	describeKindsOperation,
	engineSettings,
	formatOperation,
	formatRequestShape,
	updateOperation,
	updateRequestShape,
	validateOperation,
	validateRequestShape,
} from "./operations.js";
import { createServer } from "./server.js";
import type { ToolResponseEnvelope } from "./types.js";

function methodNotAllowed(_req: Request, res: Response): void {
	res.writeHead(405).end(
		JSON.stringify({
			jsonrpc: "2.0",
			error: { code: -32000, message: "Method not allowed." },
			id: null,
		}),
	);
}

function sendEnvelope(res: Response, envelope: ToolResponseEnvelope): void {
	res.status(envelope.valid ? 200 : 422).json(envelope);
}

/**
 * JSON route over one engine operation. The body is checked against the same
 * shape the matching MCP tool declares.
 */
function jsonRoute<Shape extends z.ZodRawShape>(
	shape: Shape,
	settings: EngineSettings,
	operation: (
		request: z.infer<z.ZodObject<Shape>>,
		settings: EngineSettings,
	) => ToolResponseEnvelope,
): RequestHandler {
	const schema = z.object(shape);
	return (req, res) => {
		const parsed = schema.safeParse(req.body);
		if (!parsed.success) {
			res.status(400).json({
				valid: false,
				metadata: null,
				error: {
					code: "INVALID_REQUEST",
					message: parsed.error.issues
						.map((i) => `${i.path.join(".") || "body"}: ${i.message}`)
						.join(", "),
				},
			} satisfies ToolResponseEnvelope);
			return;
		}
		sendEnvelope(res, operation(parsed.data, settings));
	};
}

const handleUncaught: ErrorRequestHandler = (error, _req, res, _next) => {
	if (error instanceof SyntaxError) {
		res.status(400).json({
			valid: false,
			metadata: null,
			error: { code: "INVALID_REQUEST", message: "Request body is not valid JSON" },
		} satisfies ToolResponseEnvelope);
		return;
	}
	logger.error("Unhandled request error:", error);
	res.status(500).json({
		valid: false,
		metadata: null,
		error: { code: "INTERNAL_ERROR", message: "Internal server error" },
	} satisfies ToolResponseEnvelope);
};

export function createApp(config?: Config) {
	const resolvedConfig = config ?? loadConfig();
	const settings = engineSettings(resolvedConfig);
	const app = express();
	app.use(express.json());

	// --- Streamable HTTP (MCP) ---

	app.post("/mcp", async (req: Request, res: Response) => {
		const server = createServer(resolvedConfig);
		try {
			const transport = new StreamableHTTPServerTransport({
				sessionIdGenerator: undefined,
			});
			await server.connect(transport);
			await transport.handleRequest(req, res, req.body);
			res.on("close", () => {
				Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
					logger.warn("MCP transport close error:", error);
				});
			});
		} catch (error) {
			logger.error("MCP request error:", error);
			if (!res.headersSent) {
				res.status(500).json({
					jsonrpc: "2.0",
					error: { code: -32603, message: "Internal server error" },
					id: null,
				});
			}
		}
	});

	app.get("/mcp", methodNotAllowed);
	app.delete("/mcp", methodNotAllowed);

	// --- JSON API ---

	app.post(
		"/api/citations/validate",
		jsonRoute(validateRequestShape, settings, validateOperation),
	);
	app.post("/api/citations/update", jsonRoute(updateRequestShape, settings, updateOperation));
	app.post("/api/citations/format", jsonRoute(formatRequestShape, settings, formatOperation));
	app.post("/api/bibliography", jsonRoute(bibliographyRequestShape, settings, bibliographyOperation));
	app.get("/api/kinds", (_req: Request, res: Response) => {
		sendEnvelope(res, describeKindsOperation());
	});

	// --- Health check ---

	app.get("/health", (_req: Request, res: Response) => {
		res.status(200).json({ status: "ok" });
	});

	app.use(handleUncaught);

	return app;
}
