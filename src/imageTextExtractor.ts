/**
 * src/imageTextExtractor.ts
 *
 * Image -> text adapter. The model is asked to transcribe the activity table in the
 * image verbatim (JSON array or CSV); the importer then parses that text exactly
 * like a file. Transcription quality is not checked here.
 *
 * Env (.env):
 *   OPENAI_API_KEY=...
 *   OPENAI_MODEL=gpt-4o-mini-2024-07-18   (optional)
 */
import fs from "node:fs/promises";
import path from "node:path";
import OpenAI from "openai";

export interface TextExtractor {
  extractText(filePath: string): Promise<string>;
}

type InputContent =
  | { type: "input_text"; text: string }
  | { type: "input_image"; image_url: string; detail: "low" | "high" | "auto" };

/** The slice of the OpenAI client this adapter calls. */
export interface ResponsesClient {
  responses: {
    create(body: {
      model: string;
      input: Array<{ role: "system" | "user"; content: string | InputContent[] }>;
      max_output_tokens?: number;
    }): PromiseLike<{ output_text: string }>;
  };
}

const MIME_BY_EXT: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
};

const INSTRUCTIONS =
  "You transcribe personal activity logs from images. Output only the table text: " +
  "either a JSON array of objects or CSV with a header line. Use the field names " +
  "date, diet_type, energy_kwh, car_km, bus_km, waste_kg, meals. No commentary, no code fences.";

function stripCodeFence(text: string): string {
  const m = text.trim().match(/^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/);
  return m ? m[1].trim() : text.trim();
}

export class OpenAiTextExtractor implements TextExtractor {
  constructor(
    private readonly client: ResponsesClient,
    private readonly model: string
  ) {}

  static fromApiKey(apiKey: string, model: string): OpenAiTextExtractor {
    return new OpenAiTextExtractor(new OpenAI({ apiKey }), model);
  }

  async extractText(filePath: string): Promise<string> {
    const mime = MIME_BY_EXT[path.extname(filePath).toLowerCase()];
    if (!mime) throw new Error(`Not an image file: ${filePath}`);

    const bytes = await fs.readFile(filePath);
    const dataUrl = `data:${mime};base64,${bytes.toString("base64")}`;

    const response = await this.client.responses.create({
      model: this.model,
      input: [
        { role: "system", content: INSTRUCTIONS },
        {
          role: "user",
          content: [
            { type: "input_text", text: "Transcribe the activity records in this image." },
            { type: "input_image", image_url: dataUrl, detail: "high" },
          ],
        },
      ],
      max_output_tokens: 2000,
    });

    const text = stripCodeFence(response.output_text);
    if (!text) throw new Error(`No text returned from model for ${filePath}`);
    return text;
  }
}
