declare namespace NodeJS {
    interface ProcessEnv {
        OPENROUTER_API_KEY?: string;
        OPENROUTER_BASE?: string;
        OPENROUTER_MODEL?: string;
        LLM_TEMPERATURE?: string;
        LLM_MAX_TOKENS?: string;
        LLM_TIMEOUT_MS?: string;
        LLM_MAX_ATTEMPTS?: string;
        LLM_BACKOFF_MS?: string;
        LLM_CONCURRENCY?: string;
        PROMPT_MAX_CHARS?: string;
        FEWSHOT_SEED?: string;
        LEDGER_PATH?: string;
    }
}
