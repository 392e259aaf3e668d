export const EXIT_OK = 0;
// Setup failure or invalid options
export const EXIT_SETUP_FAILED = 1;
// 128 + SIGINT
export const EXIT_CANCELLED = 130;
