export type EnvRecord = Record<string, string | undefined>;

export const getProcessEnv = (): EnvRecord => (typeof process !== 'undefined' ? process.env : {});
