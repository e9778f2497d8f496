declare namespace NodeJS {
  interface ProcessEnv {
    DEV_LOG?: string
    EXTRACT_N_BEST_SIZE?: string
    EXTRACT_MAX_ANSWER_LENGTH?: string
    EXTRACT_SENTENCE_BOUNDARY?: string
    EXTRACT_FULL_SENTENCE?: string
    EXTRACT_SHARED_SENTENCE?: string
    EXTRACT_TOP_N_SENTENCES?: string
    EXTRACT_CONTENT_OFFSET?: string
    EXTRACT_OUTPUT_DIR?: string
  }
}
