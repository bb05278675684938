import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
  sanitizeBoolean,
  sanitizeNumber,
  sanitizeServiceName,
  sanitizeSSHHost,
  sanitizeSSHUsername,
  sanitizeTaskName,
  sanitizeWorkingDir,
  ValidationError,
} from '../lib/sanitization';

describe('sanitization', () => {
  it('should accept the known task names', () => {
    expect(sanitizeTaskName(' deploy ')).to.equal('deploy');
    expect(sanitizeTaskName('restart')).to.equal('restart');
  });

  it('should reject unknown task names', () => {
    expect(() => sanitizeTaskName('rollback')).to.throw(
      ValidationError,
      'Unknown task "rollback". Available tasks: deploy, push, update, restart'
    );
  });

  it('should accept supervisor program and group names', () => {
    expect(sanitizeServiceName('glacio-api')).to.equal('glacio-api');
    expect(sanitizeServiceName('glacio:api_1')).to.equal('glacio:api_1');
    expect(() => sanitizeServiceName('glacio-api; reboot')).to.throw(
      ValidationError
    );
  });

  it('should validate remote working directories', () => {
    expect(sanitizeWorkingDir('/var/www/glacio')).to.equal('/var/www/glacio');
    expect(() => sanitizeWorkingDir('/etc/glacio')).to.throw(
      ValidationError,
      'Working directory cannot be in /etc'
    );
    // only the directory itself and its children are refused
    expect(sanitizeWorkingDir('/devel/glacio')).to.equal('/devel/glacio');
  });

  it('should validate hosts', () => {
    expect(sanitizeSSHHost('lidar.io')).to.equal('lidar.io');
    expect(sanitizeSSHHost('203.0.113.10')).to.equal('203.0.113.10');
    expect(sanitizeSSHHost('2001:db8::10')).to.equal('2001:db8::10');
    expect(sanitizeSSHHost('fe80::1%eth0')).to.equal('fe80::1%eth0');
    expect(() => sanitizeSSHHost('lidar.io; rm')).to.throw(
      ValidationError,
      'SSH host must be a valid hostname or IP address'
    );
    expect(() => sanitizeSSHHost('2001:db8::zz')).to.throw(ValidationError);
  });

  it('should validate usernames', () => {
    expect(sanitizeSSHUsername('deploy')).to.equal('deploy');
    expect(() => sanitizeSSHUsername('Deploy')).to.throw(ValidationError);
  });

  it('should parse numbers within bounds', () => {
    expect(sanitizeNumber('22', 'SSH port', 1, 65535)).to.equal(22);
    expect(() => sanitizeNumber('0', 'SSH port', 1, 65535)).to.throw(
      'SSH port must be at least 1'
    );
    expect(() => sanitizeNumber('abc', 'SSH port')).to.throw(
      'SSH port must be a valid number'
    );
  });

  it('should parse boolean flags', () => {
    expect(sanitizeBoolean('YES', 'flag')).to.be.true;
    expect(sanitizeBoolean('0', 'flag')).to.be.false;
    expect(() => sanitizeBoolean('maybe', 'flag')).to.throw(
      'flag must be true or false'
    );
  });
});
