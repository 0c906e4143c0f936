import { MediaType, QualityProfile } from '../types/media-type.js';
import type { Profile } from '../types/media.types.js';
import { createEnum } from '../utils/create-enum.js';

const commandValues = createEnum([
  'menu',
  'help',
  'status',
  'downloadVideo',
  'fastDownload',
  'hdDownload',
  'audioOnly',
  'search',
] as const);

export const Command = commandValues.object;

export type Command = typeof commandValues.type;

export const isCommand = commandValues.is;

/**
 * Inbound text after classification at the transport boundary
 */
export type ClassifiedInput = { kind: 'command'; command: Command } | { kind: 'text'; text: string };

export type ProfileCommand = Extract<Command, 'downloadVideo' | 'fastDownload' | 'hdDownload' | 'audioOnly'>;

/**
 * Profile and instruction heading of each download command
 */
export const PROFILE_COMMANDS: Record<ProfileCommand, { profile: Profile; description: string }> = {
  downloadVideo: {
    profile: { mediaType: MediaType.VIDEO, quality: QualityProfile.BEST },
    description: 'High Quality Video Download',
  },
  fastDownload: {
    profile: { mediaType: MediaType.VIDEO, quality: QualityProfile.FAST },
    description: 'Fast Download (Lower Quality)',
  },
  hdDownload: {
    profile: { mediaType: MediaType.VIDEO, quality: QualityProfile.HD },
    description: 'HD Video Download (up to 1080p)',
  },
  audioOnly: {
    profile: { mediaType: MediaType.AUDIO, quality: QualityProfile.BEST },
    description: 'Audio Extraction from Video',
  },
};

export function isProfileCommand(command: Command): command is ProfileCommand {
  return command in PROFILE_COMMANDS;
}

/**
 * Reply keyboard buttons
 */
export const BUTTONS = {
  downloadVideo: '📥 Download Video',
  fastDownload: '⚡ Fast Download',
  hdDownload: '🎬 HD Download',
  audioOnly: '🎵 Audio Only',
  search: '🔍 Search Music',
  status: '📊 Status',
  help: 'ℹ️ Help',
} as const satisfies Partial<Record<Command, string>>;

export const MENU_ROWS: string[][] = [
  [BUTTONS.downloadVideo, BUTTONS.fastDownload],
  [BUTTONS.hdDownload, BUTTONS.audioOnly],
  [BUTTONS.search, BUTTONS.status],
  [BUTTONS.help],
];

const SLASH_COMMANDS: Record<string, Command> = {
  '/start': Command.MENU,
  '/menu': Command.MENU,
  '/help': Command.HELP,
  '/status': Command.STATUS,
  '/search': Command.SEARCH,
};

const BUTTON_COMMANDS = new Map<string, Command>(
  Object.entries(BUTTONS).flatMap(([command, label]): Array<[string, Command]> =>
    isCommand(command) ? [[label, command]] : [],
  ),
);

/**
 * Map raw chat text to a command, or pass it through as text
 *
 * Slash commands may carry a bot mention ("/start@SomeBot"); buttons match exactly.
 */
export function classifyInput(raw: string): ClassifiedInput {
  const text = raw.trim();

  if (text.startsWith('/')) {
    const [head = ''] = text.split(/\s+/);
    const name = head.split('@')[0]?.toLowerCase() ?? '';
    const command = SLASH_COMMANDS[name];
    if (command) {
      return { kind: 'command', command };
    }
  }

  const button = BUTTON_COMMANDS.get(text);
  if (button) {
    return { kind: 'command', command: button };
  }

  return { kind: 'text', text };
}
