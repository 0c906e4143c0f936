import { describe, expect, it } from 'vitest';
import { BUTTONS, classifyInput, isProfileCommand, MENU_ROWS, PROFILE_COMMANDS } from './menu.js';

describe('classifyInput', () => {
  it('should map slash commands, ignoring a bot mention and arguments', () => {
    expect(classifyInput('/start')).toEqual({ kind: 'command', command: 'menu' });
    expect(classifyInput('/menu@ClipBot')).toEqual({ kind: 'command', command: 'menu' });
    expect(classifyInput('/HELP')).toEqual({ kind: 'command', command: 'help' });
    expect(classifyInput('/status now')).toEqual({ kind: 'command', command: 'status' });
  });

  it('should map every menu button', () => {
    expect(classifyInput('📥 Download Video')).toEqual({ kind: 'command', command: 'downloadVideo' });
    expect(classifyInput('⚡ Fast Download')).toEqual({ kind: 'command', command: 'fastDownload' });
    expect(classifyInput('🎬 HD Download')).toEqual({ kind: 'command', command: 'hdDownload' });
    expect(classifyInput('🎵 Audio Only')).toEqual({ kind: 'command', command: 'audioOnly' });
    expect(classifyInput('🔍 Search Music')).toEqual({ kind: 'command', command: 'search' });
    expect(classifyInput('📊 Status')).toEqual({ kind: 'command', command: 'status' });
    expect(classifyInput(' ℹ️ Help ')).toEqual({ kind: 'command', command: 'help' });
  });

  it('should pass anything else through as trimmed text', () => {
    expect(classifyInput('  https://youtu.be/abc ')).toEqual({ kind: 'text', text: 'https://youtu.be/abc' });
    expect(classifyInput('/unknown')).toEqual({ kind: 'text', text: '/unknown' });
    expect(classifyInput('Download Video')).toEqual({ kind: 'text', text: 'Download Video' });
  });
});

describe('menu layout', () => {
  it('should show every button exactly once', () => {
    expect(MENU_ROWS.flat().sort()).toEqual(Object.values(BUTTONS).sort());
  });

  it('should map profile commands to their profiles', () => {
    expect(PROFILE_COMMANDS.fastDownload.profile).toEqual({ mediaType: 'video', quality: 'fast' });
    expect(PROFILE_COMMANDS.hdDownload.profile).toEqual({ mediaType: 'video', quality: 'hd' });
    expect(PROFILE_COMMANDS.audioOnly.profile).toEqual({ mediaType: 'audio', quality: 'best' });
    expect(isProfileCommand('downloadVideo')).toBe(true);
    expect(isProfileCommand('search')).toBe(false);
  });
});
