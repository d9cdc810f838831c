import { validateEnv } from './env.validation.js';

export type AppConfig = ReturnType<typeof configuration>;

export const configuration = () => {
  // ConfigModule runs validate() first; parsing again here applies defaults
  const env = validateEnv(process.env);

  return {
    app: {
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
    },
    ai: {
      provider: env.AI_PROVIDER,
      openai: {
        apiKey: env.OPENAI_API_KEY,
        chatModel: env.OPENAI_CHAT_MODEL,
        embeddingModel: env.OPENAI_EMBEDDING_MODEL,
        transcriptionModel: env.OPENAI_TRANSCRIPTION_MODEL,
      },
    },
    database: {
      url: env.DATABASE_URL,
      ssl: env.DATABASE_SSL ?? false,
    },
    rag: {
      documentsDir: env.DOCUMENTS_DIR,
      chunkSize: env.CHUNK_SIZE,
      chunkOverlap: env.CHUNK_OVERLAP,
      topK: env.SEARCH_TOP_K,
    },
    assistant: {
      maxToolRounds: env.MAX_TOOL_ROUNDS,
      timezone: env.TIMEZONE,
    },
    integrations: {
      timeoutMs: env.INTEGRATION_TIMEOUT_MS,
      google: {
        calendarTokenPath: env.GOOGLE_CALENDAR_TOKEN_PATH,
        gmailTokenPath: env.GOOGLE_GMAIL_TOKEN_PATH,
      },
      notes: {
        folder: env.NOTES_FOLDER,
      },
    },
  };
};

export type AiConfig = AppConfig['ai'];
export type DatabaseConfig = AppConfig['database'];
export type RagConfig = AppConfig['rag'];
export type AssistantConfig = AppConfig['assistant'];
export type IntegrationsConfig = AppConfig['integrations'];
