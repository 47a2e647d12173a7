import { Ajv, type JSONSchemaType } from "ajv";

export const BROWSER_NAMES = ["chromium", "firefox", "webkit"] as const;
export type BrowserName = (typeof BROWSER_NAMES)[number];

export interface PerchConfig {
  console: {
    prompt: string;
    quitTokens: string[];
  };
  loader: {
    ignoreDirectories: string[];
    strict: boolean; // throw on files outside the host package
  };
  browser: {
    name: BrowserName;
    headless: boolean;
    timeoutMs: number; // default wait for element helpers
    startUrl?: string;
  };
}

const configSchema: JSONSchemaType<PerchConfig> = {
  type: "object",
  required: ["console", "loader", "browser"],
  properties: {
    console: {
      type: "object",
      required: ["prompt", "quitTokens"],
      properties: {
        prompt: { type: "string" },
        quitTokens: { type: "array", items: { type: "string" }, minItems: 1 },
      },
    },
    loader: {
      type: "object",
      required: ["ignoreDirectories", "strict"],
      properties: {
        ignoreDirectories: { type: "array", items: { type: "string" } },
        strict: { type: "boolean" },
      },
    },
    browser: {
      type: "object",
      required: ["name", "headless", "timeoutMs"],
      properties: {
        name: { type: "string", enum: [...BROWSER_NAMES] },
        headless: { type: "boolean" },
        timeoutMs: { type: "integer", minimum: 0 },
        startUrl: { type: "string", nullable: true },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });

export const validateConfig = ajv.compile(configSchema);
