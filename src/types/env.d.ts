declare namespace NodeJS {
  interface ProcessEnv {
    VOLBY_BASE_URL?: string;
    VOLBY_REQUEST_TIMEOUT?: string;
    VOLBY_REQUEST_DELAY?: string;
    VOLBY_USER_AGENT?: string;
  }
}
