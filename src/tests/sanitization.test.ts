import { expect } from 'chai';
import { describe, it } from 'mocha';
import * as path from 'path';
import {
  ValidationError,
  imageReference,
  sanitizeFilePath,
  sanitizeImageReference,
  sanitizeNumber,
  sanitizeParams,
  sanitizeSSHHost,
  sanitizeSSHUsername,
} from '../lib/sanitization';
import { readEnvDefaults } from '../lib/config';
import { expectThrow } from './helpers';

describe('sanitization', () => {
  it('should parse numbers within bounds', () => {
    expect(sanitizeNumber('20', 'max attempts', 1, 100)).to.equal(20);
    expect(
      expectThrow(() => sanitizeNumber('0', 'max attempts', 1, 100), ValidationError)
        .message
    ).to.equal('max attempts must be at least 1');
    expect(
      expectThrow(() => sanitizeNumber('12abc', 'backoff'), ValidationError).message
    ).to.equal('backoff must be a valid number');
  });

  it('should accept hostnames and addresses but not a port', () => {
    expect(sanitizeSSHHost(' gpu-node-1.example.internal ')).to.equal(
      'gpu-node-1.example.internal'
    );
    expect(sanitizeSSHHost('10.0.0.5')).to.equal('10.0.0.5');
    expectThrow(() => sanitizeSSHHost('10.0.0.5:2222'), ValidationError);
  });

  it('should validate unix usernames', () => {
    expect(sanitizeSSHUsername('ubuntu')).to.equal('ubuntu');
    expect(
      expectThrow(() => sanitizeSSHUsername(''), ValidationError).message
    ).to.equal('SSH username is required');
    expectThrow(() => sanitizeSSHUsername('Bad User'), ValidationError);
  });

  it('should report required, empty and oversized fields the same way', () => {
    expect(
      expectThrow(() => sanitizeSSHHost('   '), ValidationError).message
    ).to.equal('SSH host cannot be empty');
    expect(
      expectThrow(() => sanitizeSSHUsername('a'.repeat(33)), ValidationError).message
    ).to.equal('SSH username cannot exceed 32 characters');
    expect(
      expectThrow(() => sanitizeImageReference(''), ValidationError).message
    ).to.equal('Image is required');
    expect(sanitizeSSHUsername('  ubuntu ')).to.equal('ubuntu');
  });

  it('should resolve file paths', () => {
    expect(sanitizeFilePath('keys/id_rsa', 'SSH key path')).to.equal(
      path.resolve('keys/id_rsa')
    );
    expect(
      expectThrow(() => sanitizeFilePath('   ', 'SSH key path'), ValidationError)
        .message
    ).to.equal('SSH key path cannot be empty');
  });

  it('should build image references from repository and tag', () => {
    expect(imageReference('registry.local/toolkit', '1.17.0')).to.equal(
      'registry.local/toolkit:1.17.0'
    );
    expect(imageReference('toolkit')).to.equal('toolkit');
    expect(sanitizeImageReference('demo@sha256:abc123')).to.equal(
      'demo@sha256:abc123'
    );
    expectThrow(() => sanitizeImageReference('demo; rm -rf /tmp/x'), ValidationError);
  });

  it('should parse template parameters', () => {
    expect(sanitizeParams(['Channel=stable', 'Flags=--a=b'])).to.deep.equal({
      Channel: 'stable',
      Flags: '--a=b',
    });
    expect(
      expectThrow(() => sanitizeParams(['noequals']), ValidationError).message
    ).to.equal('Parameter must look like KEY=VALUE: noequals');
    expect(
      expectThrow(() => sanitizeParams(['1st=x']), ValidationError).message
    ).to.equal('Invalid parameter name: 1st');
    expectThrow(() => sanitizeParams(['Image=demo']), ValidationError);
  });
});

describe('readEnvDefaults', () => {
  it('should read settings and ignore blank values', () => {
    const defaults = readEnvDefaults({
      IMAGE_REPO: 'toolkit',
      IMAGE_TAG: ' 1.0 ',
      SSH_KEY_PATH: '/keys/id_rsa',
      SSH_USER: 'ubuntu',
      REMOTE_HOST: '',
      SSH_CONNECT_ATTEMPTS: '5',
    });

    expect(defaults).to.deep.equal({
      imageRepo: 'toolkit',
      imageTag: '1.0',
      sshKey: '/keys/id_rsa',
      sshUser: 'ubuntu',
      remoteHost: undefined,
      passphrase: undefined,
      maxAttempts: '5',
      backoffMs: undefined,
    });
  });
});
