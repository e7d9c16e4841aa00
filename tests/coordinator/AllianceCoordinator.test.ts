import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AllianceCoordinator, parseAllianceCommand } from '@/engine/coordinator/AllianceCoordinator';
import { NullChatChannel } from '@/engine/messaging/NullChatChannel';
import { createTestWorld, type TestWorld, ALICE, MYFC, SOBAN } from '../alliance/helpers';

// ── Spy channel ──

function createSpyChannel() {
  const channel = new NullChatChannel();
  const send = vi.spyOn(channel, 'send');
  return { channel, send };
}

let world: TestWorld;
let send: ReturnType<typeof createSpyChannel>['send'];
let coord: AllianceCoordinator;

function linesTo(handle: string): string[] {
  return send.mock.calls.filter(([h]) => h === handle).map(([, message]) => message);
}

beforeEach(() => {
  world = createTestWorld({ factions: ['SOBAN', 'KHAANEPH'] });
  const spy = createSpyChannel();
  send = spy.send;
  coord = new AllianceCoordinator(world.session, spy.channel);
});

describe('parseAllianceCommand', () => {
  it('ignores ordinary chat and look-alike prefixes', () => {
    expect(parseAllianceCommand('hello there')).toBeNull();
    expect(parseAllianceCommand('/alliancex SOBAN')).toBeNull();
    expect(parseAllianceCommand('/allies')).toBeNull();
  });

  it('matches the prefix case-insensitively', () => {
    expect(parseAllianceCommand('/ALLIANCE list')).toEqual({ kind: 'list' });
    expect(parseAllianceCommand('  /Alliance')).toEqual({ kind: 'help' });
  });

  it('recognises subcommands case-insensitively', () => {
    expect(parseAllianceCommand('/alliance HELP')).toEqual({ kind: 'help' });
    expect(parseAllianceCommand('/alliance Status')).toEqual({ kind: 'status' });
    expect(parseAllianceCommand('/alliance ResetAll')).toEqual({ kind: 'resetAll' });
    expect(parseAllianceCommand('/alliance RESET MYFC')).toEqual({ kind: 'reset', tag: 'MYFC' });
    expect(parseAllianceCommand('/alliance reset')).toEqual({ kind: 'reset', tag: null });
  });

  it('passes anything else through as a case-sensitive tag', () => {
    expect(parseAllianceCommand('/alliance  SoBan ')).toEqual({ kind: 'align', tag: 'SoBan' });
  });
});

describe('AllianceCoordinator', () => {
  it('does not consume ordinary chat', () => {
    expect(coord.handleMessage('alice', 'gg')).toBe(false);
    expect(send).not.toHaveBeenCalled();
  });

  it('aligns and replies with the confirmation lines', () => {
    expect(coord.handleMessage('alice', '/alliance SOBAN')).toBe(true);
    expect(linesTo('alice')).toEqual([
      'Your faction [MYFC] has aligned with [SOBAN] Soban Republic!',
      '  Reputation set to 1500 with [SOBAN].',
      '  Reputation set to -1500 with all other alliance factions.',
    ]);
    expect(world.host.getFactionReputation(MYFC, SOBAN)).toBe(1500);
  });

  it('replies with the failure message when alignment is refused', () => {
    coord.handleMessage('bob', '/alliance SOBAN');
    expect(linesTo('bob')).toEqual(['Only the founder or a leader of your faction can choose an alliance.']);
  });

  it('lists the allowed factions', () => {
    coord.handleMessage('eve', '/alliance list');
    expect(linesTo('eve')).toEqual([
      'Available Alliance Factions:',
      '  [SOBAN] Soban Republic',
      '  [KHAANEPH] Khaaneph Raiders',
    ]);
  });

  it('says so when no factions are configured', () => {
    const empty = createTestWorld({ factions: [] });
    const spy = createSpyChannel();
    new AllianceCoordinator(empty.session, spy.channel).handleMessage('eve', '/alliance list');
    expect(spy.send).toHaveBeenCalledWith('eve', 'No alliance factions are currently configured.');
  });

  it('shows help, with admin lines only for admins', () => {
    coord.handleMessage('alice', '/alliance');
    coord.handleMessage('admin', '/alliance help');
    expect(linesTo('alice')).toHaveLength(5);
    expect(linesTo('admin')).toHaveLength(7);
    expect(linesTo('admin')[6]).toBe('  /alliance resetall      - Let every player faction choose again');
  });

  describe('status', () => {
    it('shows personal reputation, relation and the pending choice', () => {
      world.host.setActorReputation(ALICE, SOBAN, -600);
      world.host.setFactionReputation(MYFC, SOBAN, -600);

      coord.handleMessage('alice', '/alliance status');

      expect(linesTo('alice')).toEqual([
        'Your Faction Reputations:',
        '  [SOBAN] Soban Republic: -600 (enemy)',
        '  [KHAANEPH] Khaaneph Raiders: 0 (neutral)',
        '  (Your faction [MYFC] has not yet chosen an alliance)',
      ]);
    });

    it('reflects a completed choice', () => {
      coord.handleMessage('alice', '/alliance KHAANEPH');
      send.mockClear();

      coord.handleMessage('bob', '/alliance status');

      expect(linesTo('bob')).toEqual([
        'Your Faction Reputations:',
        '  [SOBAN] Soban Republic: -1500 (enemy)',
        '  [KHAANEPH] Khaaneph Raiders: 1500 (ally)',
        '  (Your faction [MYFC] has already chosen an alliance)',
      ]);
    });

    it('omits the relation for a factionless player', () => {
      coord.handleMessage('eve', '/alliance status');
      expect(linesTo('eve')).toEqual([
        'Your Faction Reputations:',
        '  [SOBAN] Soban Republic: 0',
        '  [KHAANEPH] Khaaneph Raiders: 0',
        '  (You are not in a faction)',
      ]);
    });

    it('reports an unresolved identity', () => {
      coord.handleMessage('ghost', '/alliance status');
      expect(linesTo('ghost')).toEqual(['Error: Could not resolve your player identity.']);
    });
  });

  describe('admin commands', () => {
    it('refuses reset for non-admins and changes nothing', () => {
      coord.handleMessage('alice', '/alliance SOBAN');
      send.mockClear();

      coord.handleMessage('alice', '/alliance reset MYFC');

      expect(linesTo('alice')).toEqual(['You do not have permission to use that command.']);
      expect(world.session.hasChosen(MYFC)).toBe(true);
    });

    it('resets a faction for an admin', () => {
      coord.handleMessage('alice', '/alliance SOBAN');
      coord.handleMessage('admin', '/alliance reset MYFC');

      expect(linesTo('admin')).toEqual([
        'Alliance choice for [MYFC] has been reset. Reputation set to -600 with all alliance factions.',
      ]);
      expect(world.session.hasChosen(MYFC)).toBe(false);
    });

    it('shows usage for reset without a tag', () => {
      coord.handleMessage('admin', '/alliance reset');
      expect(linesTo('admin')).toEqual(['Usage: /alliance reset <FactionTag>']);
    });

    it('reports an unknown reset tag', () => {
      coord.handleMessage('admin', '/alliance reset NOPE');
      expect(linesTo('admin')).toEqual(["Faction with tag 'NOPE' not found."]);
    });

    it('resets every player faction', () => {
      coord.handleMessage('admin', '/alliance resetall');
      expect(linesTo('admin')).toEqual([
        'Reset 2 player faction(s). Reputation set to -600 with all alliance factions.',
      ]);
    });

    it('refuses resetall for non-admins', () => {
      coord.handleMessage('carol', '/alliance resetall');
      expect(linesTo('carol')).toEqual(['You do not have permission to use that command.']);
    });
  });
});
