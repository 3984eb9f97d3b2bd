const PING_COMMAND = 'ping';

export function isPingCommand(text: string): boolean {
  return text.toLowerCase() === PING_COMMAND;
}
