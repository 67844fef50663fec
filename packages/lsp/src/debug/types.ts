export type LogLevel = 'debug' | 'log' | 'warn' | 'error';

export interface DebugSettings {
  enabled: boolean;
  namespaces: string[];
  level: LogLevel;
}
