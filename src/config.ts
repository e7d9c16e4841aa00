export const COMMAND_PREFIX   = '/alliance';
export const CONFIG_FILE_NAME = 'Alliance.cfg';
export const LEDGER_FILE_NAME = 'Alliance_FactionChoices.dat';

/** Channel id the relay transport tags feedback packets with. */
export const NETWORK_CHANNEL_ID = 39471;
/** Sender label shown next to feedback lines in the client chat. */
export const CHAT_SENDER = 'Alliance';

export const DEFAULT_WORLD_DIR = 'worlds/sample';
export const DEFAULT_TICK_MS   = 100;
