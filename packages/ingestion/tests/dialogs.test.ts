import { describe, it, expect } from 'vitest';
import { describeDialog, formatDialog } from '../src/telegram/dialogs';

describe('describeDialog', () => {
  it('should summarize a channel with its input peer', () => {
    const summary = describeDialog(
      { className: 'Channel', id: 555n, title: 'News', username: 'news', participantsCount: 120, megagroup: false, broadcast: true },
      -1000000000555,
      { className: 'InputPeerChannel', channelId: 555n, accessHash: -42n },
    );

    expect(summary).toEqual({
      title: 'News',
      id: 555,
      username: 'news',
      type: 'Channel',
      peer_id: -1000000000555,
      is_self: false,
      is_bot: false,
      deleted: false,
      participants_count: 120,
      megagroup: false,
      broadcast: true,
      input_peer: { type: 'InputPeerChannel', channel_id: '555', access_hash: '-42' },
    });
    expect(formatDialog(summary)).toEqual([
      'News',
      '  ID: 555',
      '  Username: news',
      '  Type: Channel',
      '  PeerID: -1000000000555',
      '  Participants: 120',
      '  Channel',
      '  InputPeer: InputPeerChannel (channel_id=555, access_hash=-42)',
      '-'.repeat(40),
    ]);
  });

  it('should fall back to the first name for users', () => {
    const summary = describeDialog({ className: 'User', id: 7, firstName: 'Alice', self: true }, 7, null);

    expect(summary.title).toBe('Alice');
    expect(summary.is_self).toBe(true);
    expect(summary.input_peer).toBeNull();
    expect(formatDialog(summary)).toEqual([
      'Alice',
      '  ID: 7',
      '  Username: None',
      '  Type: User',
      '  PeerID: 7',
      '  This is your own account',
      '-'.repeat(40),
    ]);
  });
});
