export type CliResponse = {
  stdout?: string;
  stderr?: string;
  exitCode: number;
};
