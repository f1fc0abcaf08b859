// functions/src/config.ts
// Runtime configuration, read once at cold start and passed down explicitly.

export type ImageSize = "256x256" | "512x512" | "1024x1024" | "1792x1024" | "1024x1792";

const IMAGE_SIZES: readonly ImageSize[] = [
  "256x256",
  "512x512",
  "1024x1024",
  "1792x1024",
  "1024x1792",
];

export type AppConfig = Readonly<{
  openaiApiKey: string | null;
  maxInstances: number;

  cors: Readonly<{
    origins: string;
    methods: readonly string[];
    headers: string;
    maxAgeSeconds: string;
  }>;

  ai: Readonly<{
    model: string;
    temperature: number; // used when a call does not pass its own
  }>;

  image: Readonly<{
    model: string;
    size: ImageSize;     // size requested from the image API
    frameSize: number;   // GIF frames are resized to frameSize x frameSize
    frameDurationMs: number;
  }>;

  web: Readonly<{
    requestTimeoutMs: number;
    maxSearchResults: number;
    maxScrapedContentLength: number;
    maxScrapedPages: number;
  }>;

  notifications: Readonly<{
    previewLength: number;
  }>;

  history: Readonly<{
    maxMessages: number; // how many history entries go into a prompt
  }>;
}>;

export type EnvLike = Record<string, string | undefined>;

function readString(env: EnvLike, key: string, fallback: string): string {
  const v = (env[key] ?? "").trim();
  return v || fallback;
}

function readNumber(env: EnvLike, key: string, fallback: number): number {
  const raw = (env[key] ?? "").trim();
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function readPositiveInt(env: EnvLike, key: string, fallback: number): number {
  const n = readNumber(env, key, fallback);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function readImageSize(env: EnvLike, key: string, fallback: ImageSize): ImageSize {
  const raw = (env[key] ?? "").trim();
  return IMAGE_SIZES.find((s) => s === raw) ?? fallback;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const values: unknown[] = Object.values(obj);
  for (const v of values) {
    if (v && typeof v === "object" && !Object.isFrozen(v)) deepFreeze(v);
  }
  return Object.freeze(obj);
}

export function loadConfig(env: EnvLike = process.env): AppConfig {
  const apiKey = (env.OPENAI_API_KEY ?? "").trim();

  return deepFreeze({
    openaiApiKey: apiKey || null,
    maxInstances: readPositiveInt(env, "MAX_INSTANCES", 10),

    cors: {
      origins: readString(env, "CORS_ORIGINS", "*"),
      methods: ["POST", "OPTIONS"],
      headers: "Content-Type",
      maxAgeSeconds: "3600",
    },

    ai: {
      model: readString(env, "AI_MODEL", "gpt-4o-mini"),
      temperature: readNumber(env, "AI_TEMPERATURE", 0.7),
    },

    image: {
      model: readString(env, "IMAGE_MODEL", "dall-e-3"),
      size: readImageSize(env, "IMAGE_SIZE", "1024x1024"),
      frameSize: readPositiveInt(env, "GIF_FRAME_SIZE", 512),
      frameDurationMs: readPositiveInt(env, "GIF_FRAME_DURATION_MS", 500),
    },

    web: {
      // REQUEST_TIMEOUT is given in seconds
      requestTimeoutMs: readPositiveInt(env, "REQUEST_TIMEOUT", 10) * 1000,
      maxSearchResults: readPositiveInt(env, "MAX_SEARCH_RESULTS", 5),
      maxScrapedContentLength: readPositiveInt(env, "MAX_SCRAPED_CONTENT_LENGTH", 1000),
      maxScrapedPages: readPositiveInt(env, "MAX_SCRAPED_PAGES", 3),
    },

    notifications: {
      previewLength: readPositiveInt(env, "NOTIFICATION_PREVIEW_LENGTH", 100),
    },

    history: {
      maxMessages: readPositiveInt(env, "HISTORY_WINDOW", 10),
    },
  });
}
