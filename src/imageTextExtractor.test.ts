import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterAll, describe, expect, it, vi } from "vitest";
import { OpenAiTextExtractor, ResponsesClient } from "./imageTextExtractor";

type CreateBody = Parameters<ResponsesClient["responses"]["create"]>[0];

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "carbon-image-"));
const imagePath = path.join(tmpDir, "scan.png");
fs.writeFileSync(imagePath, Buffer.from([1, 2, 3]));

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function fakeClient(outputText: string) {
  const create = vi.fn((_body: CreateBody) => Promise.resolve({ output_text: outputText }));
  const client: ResponsesClient = { responses: { create } };
  return { client, create };
}

describe("OpenAiTextExtractor", () => {
  it("sends the image as a data URL and strips code fences from the answer", async () => {
    const { client, create } = fakeClient("```csv\ndate,diet_type,energy_kwh\n2023-08-01,vegan,2\n```");
    const extractor = new OpenAiTextExtractor(client, "test-model");

    const text = await extractor.extractText(imagePath);

    expect(text).toBe("date,diet_type,energy_kwh\n2023-08-01,vegan,2");
    expect(create).toHaveBeenCalledTimes(1);

    const body = create.mock.calls[0][0];
    expect(body.model).toBe("test-model");
    expect(body.input[1]).toEqual({
      role: "user",
      content: [
        { type: "input_text", text: "Transcribe the activity records in this image." },
        { type: "input_image", image_url: "data:image/png;base64,AQID", detail: "high" },
      ],
    });
  });

  it("fails on an empty answer", async () => {
    const { client } = fakeClient("   ");
    await expect(new OpenAiTextExtractor(client, "test-model").extractText(imagePath)).rejects.toThrow(
      `No text returned from model for ${imagePath}`
    );
  });

  it("refuses non-image paths without calling the model", async () => {
    const { client, create } = fakeClient("[]");
    await expect(new OpenAiTextExtractor(client, "test-model").extractText("notes.txt")).rejects.toThrow(
      "Not an image file: notes.txt"
    );
    expect(create).not.toHaveBeenCalled();
  });
});
