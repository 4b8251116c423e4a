import { Logger } from "@nestjs/common";
import { ModelUnavailableError } from "../../common/errors/verification.errors";
import type { CapabilitySettings } from "../../config/environment";
import type { NormalizedImage } from "../verification.types";
import type {
  CapabilityCallOptions,
  CaptioningCapability,
} from "./capability.interfaces";

type CaptioningEndpoint = Pick<
  CapabilitySettings,
  "captioningUrl" | "captioningApiKey"
>;

const ANSWER_KEYS = ["answer", "generated_text"] as const;

function readAnswerField(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  for (const key of ANSWER_KEYS) {
    const candidate: unknown = Reflect.get(value, key);
    if (typeof candidate === "string") {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Accepts the response shapes visual-question-answering servers commonly
 * return: `{ answer }`, `{ generated_text }`, or a ranked list of either.
 */
export function readCaptionAnswer(body: unknown): string | undefined {
  if (typeof body === "string") {
    return body;
  }
  if (Array.isArray(body)) {
    return body.length > 0 ? readAnswerField(body[0]) : undefined;
  }
  return readAnswerField(body);
}

/** Visual question answering over HTTP (`POST {inputs: {image, question}}`). */
export class HttpCaptioningCapability implements CaptioningCapability {
  readonly name = "http-captioning";
  private readonly logger = new Logger(HttpCaptioningCapability.name);
  private opened = false;

  constructor(private readonly endpoint: CaptioningEndpoint) {}

  async open(): Promise<void> {
    this.opened = true;
    this.logger.log(`Captioning endpoint ${new URL(this.endpoint.captioningUrl).origin}`);
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  async caption(
    image: NormalizedImage,
    prompt: string,
    options: CapabilityCallOptions,
  ): Promise<string> {
    if (!this.opened) {
      throw new ModelUnavailableError("classify", "closed");
    }

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    if (this.endpoint.captioningApiKey) {
      headers.Authorization = `Bearer ${this.endpoint.captioningApiKey}`;
    }

    const response = await fetch(this.endpoint.captioningUrl, {
      method: "POST",
      headers,
      body: JSON.stringify({
        inputs: {
          image: image.encoded.toString("base64"),
          question: prompt,
        },
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      throw new ModelUnavailableError(
        "classify",
        "backend_error",
        new Error(`captioning endpoint returned HTTP ${response.status}`),
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ModelUnavailableError("classify", "backend_error", error);
    }

    // An answer in an unknown shape is treated as no answer, not as an outage.
    return readCaptionAnswer(body) ?? "";
  }
}
