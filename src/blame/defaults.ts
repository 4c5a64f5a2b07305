export const DEFAULT_MAX_DEPTH = 10;
export const DEFAULT_RESULT_LIMIT = 50;

// dpkg reports sizes in decimal multiples
export const MB = 1000 * 1000;
