import { expect } from 'chai';
import { describe, it, before, after } from 'mocha';
import sinon from 'sinon';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildRemoteConfig, loadConfig } from '../lib/config';
import { ValidationError } from '../lib/sanitization';
import { ResolvedSSHHost } from '../lib/ssh-config';

describe('loadConfig', () => {
  it('should fall back to the glacio defaults', () => {
    const config = loadConfig({});

    expect(config.host).to.equal('lidar.io');
    expect(config.useSshConfig).to.be.true;
    expect(config.sshConfigPath).to.equal('~/.ssh/config');
    expect(config.remoteDirectory).to.equal('/var/www/glacio');
    expect(config.service).to.equal('glacio-api');
    expect(config.shell).to.equal('/bin/bash -l -c');
    expect(config.readyTimeout).to.equal(20000);
    expect(config.agent).to.be.undefined;
  });

  it('should freeze the configuration', () => {
    expect(Object.isFrozen(loadConfig({}))).to.be.true;
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      DEPLOY_HOST: 'staging.example.com',
      DEPLOY_USE_SSH_CONFIG: 'false',
      DEPLOY_REMOTE_DIR: '/srv/glacio',
      DEPLOY_SERVICE: 'glacio:api',
      DEPLOY_SSH_USER: 'deploy',
      DEPLOY_SSH_PORT: '2222',
      DEPLOY_SHELL: '',
      DEPLOY_SUDO_PASSWORD: 'test-secret',
      SSH_AUTH_SOCK: '/tmp/agent.sock',
    });

    expect(config.host).to.equal('staging.example.com');
    expect(config.useSshConfig).to.be.false;
    expect(config.remoteDirectory).to.equal('/srv/glacio');
    expect(config.service).to.equal('glacio:api');
    expect(config.username).to.equal('deploy');
    expect(config.port).to.equal(2222);
    expect(config.shell).to.equal('');
    expect(config.sudoPassword).to.equal('test-secret');
    expect(config.agent).to.equal('/tmp/agent.sock');
  });

  it('should let command line overrides win', () => {
    const config = loadConfig(
      { DEPLOY_HOST: 'staging.example.com' },
      { host: 'backup.example.com', useSshConfig: false }
    );

    expect(config.host).to.equal('backup.example.com');
    expect(config.useSshConfig).to.be.false;
  });

  it('should reject a relative remote directory', () => {
    expect(() => loadConfig({ DEPLOY_REMOTE_DIR: 'var/www/glacio' })).to.throw(
      ValidationError,
      'Working directory must be an absolute path'
    );
  });

  it('should reject an out of range port', () => {
    expect(() => loadConfig({ DEPLOY_SSH_PORT: '70000' })).to.throw(
      ValidationError,
      'SSH port cannot exceed 65535'
    );
  });

  it('should reject an invalid service name', () => {
    expect(() => loadConfig({ DEPLOY_SERVICE: 'glacio api' })).to.throw(
      ValidationError
    );
  });
});

describe('buildRemoteConfig', () => {
  let tmpDir: string;

  const resolved: ResolvedSSHHost = {
    alias: 'lidar.io',
    hostName: '203.0.113.10',
    user: 'deploy',
    port: 2222,
  };

  before(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'glacio-deploy-'));
  });

  after(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should take host, user and port from the ssh config', () => {
    const remote = buildRemoteConfig(loadConfig({}), () => resolved);

    expect(remote.label).to.equal('lidar.io');
    expect(remote.ssh.host).to.equal('203.0.113.10');
    expect(remote.ssh.username).to.equal('deploy');
    expect(remote.ssh.port).to.equal(2222);
    expect(remote.ssh.readyTimeout).to.equal(20000);
    expect(remote.ssh.privateKey).to.be.undefined;
    expect(remote.shell).to.equal('/bin/bash -l -c');
  });

  it('should prefer explicit environment values over the ssh config', () => {
    const config = loadConfig({
      DEPLOY_SSH_USER: 'release',
      DEPLOY_SSH_PORT: '2200',
    });

    const remote = buildRemoteConfig(config, () => resolved);

    expect(remote.ssh.username).to.equal('release');
    expect(remote.ssh.port).to.equal(2200);
  });

  it('should skip the ssh config when disabled', () => {
    const resolveHost = sinon.spy(() => resolved);
    const config = loadConfig({ DEPLOY_USE_SSH_CONFIG: 'no' });

    const remote = buildRemoteConfig(config, resolveHost);

    expect(resolveHost.called).to.be.false;
    expect(remote.ssh.host).to.equal('lidar.io');
    expect(remote.ssh.port).to.equal(22);
  });

  it('should disable shell wrapping for an empty shell', () => {
    const remote = buildRemoteConfig(loadConfig({ DEPLOY_SHELL: '' }), () => resolved);

    expect(remote.shell).to.be.undefined;
  });

  it('should load the private key and passphrase', () => {
    const keyPath = path.join(tmpDir, 'test-key');
    fs.writeFileSync(keyPath, 'test-private-key', { mode: 0o600 });
    const config = loadConfig({
      DEPLOY_SSH_KEY: keyPath,
      DEPLOY_SSH_PASSPHRASE: 'test-passphrase',
    });

    const remote = buildRemoteConfig(config, () => resolved);

    expect(remote.ssh.privateKey).to.equal('test-private-key');
    expect(remote.ssh.passphrase).to.equal('test-passphrase');
  });

  it('should use the IdentityFile from the ssh config when it exists', () => {
    const keyPath = path.join(tmpDir, 'identity');
    fs.writeFileSync(keyPath, 'test-identity', { mode: 0o600 });

    const remote = buildRemoteConfig(loadConfig({}), () => ({
      ...resolved,
      identityFile: keyPath,
    }));

    expect(remote.ssh.privateKey).to.equal('test-identity');
  });

  it('should ignore a missing IdentityFile from the ssh config', () => {
    const remote = buildRemoteConfig(loadConfig({}), () => ({
      ...resolved,
      identityFile: path.join(tmpDir, 'never-created'),
    }));

    expect(remote.ssh.privateKey).to.be.undefined;
  });

  it('should reject a missing explicit key file', () => {
    const config = loadConfig({ DEPLOY_SSH_KEY: path.join(tmpDir, 'missing-key') });

    expect(() => buildRemoteConfig(config, () => resolved)).to.throw(
      ValidationError,
      'SSH key file does not exist'
    );
  });
});
