import { expect } from 'chai';
import { decodeAuthState, encodeAuthState } from './auth-state.js';
import { NOW } from './fixtures/test-data.js';

const encode = (payload: unknown) =>
  Buffer.from(JSON.stringify(payload), 'utf8').toString('base64');

const decodeRaw = (state: string): unknown =>
  JSON.parse(Buffer.from(state, 'base64').toString('utf8'));

describe('auth state', () => {
  it('encodes the configuration id and issue time in seconds as base64 JSON', () => {
    const state = encodeAuthState('cfg-1', { now: NOW });

    expect(decodeRaw(state)).to.deep.equal({ uid: 'cfg-1', timestamp: NOW / 1000 });
  });

  it('embeds an anti-forgery token when given one', () => {
    const state = encodeAuthState('cfg-1', { now: NOW, csrf: 'random-value' });

    expect(decodeRaw(state)).to.deep.equal({
      uid: 'cfg-1',
      timestamp: NOW / 1000,
      csrf: 'random-value',
    });
    expect(decodeAuthState(state)).to.deep.equal({
      uid: 'cfg-1',
      timestamp: NOW / 1000,
      csrf: 'random-value',
    });
  });

  it('accepts numeric identifiers from existing registrations', () => {
    expect(decodeAuthState(encode({ uid: 42, timestamp: 1 }))).to.deep.equal({
      uid: '42',
      timestamp: 1,
    });
  });

  it('rejects states that are not base64 JSON', () => {
    expect(decodeAuthState('%%%not-base64%%%')).to.be.null;
    expect(decodeAuthState(Buffer.from('plain text').toString('base64'))).to.be.null;
  });

  it('rejects payloads without a configuration id', () => {
    expect(decodeAuthState(encode({ timestamp: 1 }))).to.be.null;
    expect(decodeAuthState(encode({ uid: '' }))).to.be.null;
    expect(decodeAuthState(encode({ uid: -3 }))).to.be.null;
    expect(decodeAuthState(encode(['cfg-1']))).to.be.null;
    expect(decodeAuthState(encode(null))).to.be.null;
  });
});
