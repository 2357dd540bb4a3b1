import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";

import { LETTER_TYPES, LETTER_TYPE_VALUES } from "../constants/letter-types";
import {
  fromParsedRequest,
  generateLetterSchema,
  previewInstructionsSchema,
} from "../schemas/tool-schemas";
import type { CanonicalInstructionSet, TextGenerator } from "../types";
import type { Config } from "../config";
import { log } from "../config";
import { runLetterPipeline } from "../letter/pipeline";
import { previewInstructions } from "../letter/instructions";
import { saveLetter } from "../letter/download";
import { resolveSettings } from "../llm/generator";
import { toMcpError } from "../utils/errors";

export interface ToolDeps {
  config: Config;
  instructions: CanonicalInstructionSet;
  generator: TextGenerator;
}

const letterTypeProperty = {
  type: "string",
  description: "CoverageDecision, Denial or RequestForInfo (labels such as 'Denial Letter' are accepted)",
  enum: [
    ...new Set(
      Object.values(LETTER_TYPES).flatMap((d) => [d.type, d.label, ...d.aliases])
    ),
  ],
};

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: "letter.types",
    description:
      "List the supported letter types and whether the loaded canonical instruction document has an excerpt for each.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "letter.instructions",
    description:
      "Preview the canonical instruction document, or the excerpt used for one letter type.",
    inputSchema: {
      type: "object",
      properties: {
        letter_type: letterTypeProperty,
        max_chars: { type: "number", default: 6000 },
      },
    },
  },
  {
    name: "letter.generate",
    description:
      "Generate an insurance letter: drafts from the canonical instructions, formats it, then adds required compliance language. Returns the final plain-text letter and a download file name.",
    inputSchema: {
      type: "object",
      required: ["letter_type", "company_name", "insured_name", "policy_number", "claim_number"],
      properties: {
        letter_type: letterTypeProperty,
        company_name: { type: "string" },
        insured_name: { type: "string" },
        policy_number: { type: "string" },
        claim_number: { type: "string" },
        contact_phone: { type: "string", description: "Claims department phone (optional)" },
        response_deadline_days: { type: "number", minimum: 0, maximum: 90, default: 30 },
        notes: { type: "string", description: "Optional notes / context for the letter" },
        model: { type: "string", description: "Override the configured model" },
        temperature: { type: "number", minimum: 0, maximum: 1 },
        save_to_file: {
          type: "boolean",
          default: false,
          description: "Also write the letter as a .txt file in OUTPUT_DIR",
        },
      },
    },
  },
];

function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.output<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "input"}: ${issue.message}`
    );
    throw new McpError(ErrorCode.InvalidParams, issues.join("; "));
  }
  return result.data;
}

const json = (value: unknown): CallToolResult => ({
  content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
});

export async function handleToolCall(
  name: string,
  args: unknown,
  deps: ToolDeps
): Promise<CallToolResult> {
  log("info", `Tool call: ${name}`);

  try {
    switch (name) {
      case "letter.types": {
        return json({
          letterTypes: LETTER_TYPE_VALUES.map((type) => ({
            type,
            label: LETTER_TYPES[type].label,
            hasInstructions: deps.instructions.excerpts.has(type),
          })),
          instructionsPath: deps.instructions.sourcePath,
        });
      }

      case "letter.instructions": {
        const input = parseArgs(previewInstructionsSchema, args);
        return {
          content: [
            {
              type: "text",
              text: previewInstructions(deps.instructions, input.letter_type, input.max_chars),
            },
          ],
        };
      }

      case "letter.generate": {
        const input = parseArgs(generateLetterSchema, args);
        const request = fromParsedRequest(input);
        const settings = resolveSettings(deps.config, deps.generator, {
          model: input.model,
          temperature: input.temperature,
        });

        const letter = await runLetterPipeline(request, {
          instructions: deps.instructions,
          generator: deps.generator,
          settings,
        });

        const savedPath = input.save_to_file
          ? await saveLetter(letter, deps.config.outputDir)
          : undefined;

        return json({ ...letter, savedPath });
      }

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  } catch (err) {
    if (err instanceof McpError) throw err;
    log("error", `Tool ${name} failed`, err);
    throw toMcpError(err);
  }
}
