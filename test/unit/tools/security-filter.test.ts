import test from 'ava';
import {
  SecurityFilter,
  isDangerousDirectory,
  isDangerousFile,
  isPathDangerous,
  validateCommandOperation,
  validateFileOperation,
} from '../../../src/tools/security-filter.js';

// ========================================
// isDangerousFile tests
// ========================================

test('isDangerousFile detects .env files', t => {
  t.true(isDangerousFile('.env'));
  t.true(isDangerousFile('/project/.env'));
  t.true(isDangerousFile('config/.env.local'));
  t.true(isDangerousFile('.env.production'));
});

test('isDangerousFile detects key and credential files', t => {
  t.true(isDangerousFile('/home/user/id_rsa'));
  t.true(isDangerousFile('id_ed25519'));
  t.true(isDangerousFile('/app/credentials'));
  t.true(isDangerousFile('private_key.pem'));
  t.true(isDangerousFile('.npmrc'));
});

test('isDangerousFile matches wildcard patterns on the file name', t => {
  t.true(isDangerousFile('secrets.prod.json'));
  t.true(isDangerousFile('config/secrets.json'));
  t.false(isDangerousFile('secrets.prod.yaml'));
});

test('isDangerousFile is case insensitive and handles backslashes', t => {
  t.true(isDangerousFile('C:\\Users\\me\\.ENV'));
  t.true(isDangerousFile('/Project/ID_RSA'));
});

test('isDangerousFile allows ordinary files', t => {
  t.false(isDangerousFile('src/index.ts'));
  t.false(isDangerousFile('README.md'));
  t.false(isDangerousFile('environment.ts'));
  t.false(isDangerousFile(''));
});

// ========================================
// isDangerousDirectory tests
// ========================================

test('isDangerousDirectory detects protected directories and their contents', t => {
  t.true(isDangerousDirectory('.git'));
  t.true(isDangerousDirectory('project/.git/hooks'));
  t.true(isDangerousDirectory('/home/user/.ssh'));
  t.true(isDangerousDirectory('/home/user/.aws/config'));
  t.true(isDangerousDirectory('/home/user/.shell-pilot/config.json'));
});

test('isDangerousDirectory anchors absolute entries', t => {
  t.true(isDangerousDirectory('/etc/shadow'));
  t.false(isDangerousDirectory('/backup/etc/shadow-copy'));
});

test('isDangerousDirectory does not match partial segment names', t => {
  t.false(isDangerousDirectory('src/.github/workflows'));
  t.false(isDangerousDirectory('my.git.notes'));
});

test('isPathDangerous combines file and directory checks', t => {
  t.true(isPathDangerous('.env'));
  t.true(isPathDangerous('.gnupg/pubring.kbx'));
  t.false(isPathDangerous('docs/guide.md'));
});

// ========================================
// validateFileOperation / validateCommandOperation tests
// ========================================

test('validateFileOperation returns a reason naming the operation', t => {
  t.deepEqual(validateFileOperation('.env', 'read'), {
    allowed: false,
    reason: 'Security policy blocks read operation on sensitive path: .env',
  });
  t.deepEqual(validateFileOperation('notes.txt', 'write'), { allowed: true });
});

test('validateCommandOperation finds sensitive paths in commands', t => {
  t.deepEqual(validateCommandOperation('cat .env'), {
    allowed: false,
    reason: 'Security policy blocks command referencing sensitive path: .env',
  });
  t.deepEqual(validateCommandOperation('cat "config/id_rsa"'), {
    allowed: false,
    reason: 'Security policy blocks command referencing sensitive path: config/id_rsa',
  });
});

test('validateCommandOperation checks values after "="', t => {
  t.deepEqual(validateCommandOperation('tool --config=.env'), {
    allowed: false,
    reason: 'Security policy blocks command referencing sensitive path: .env',
  });
});

test('validateCommandOperation allows ordinary commands', t => {
  t.deepEqual(validateCommandOperation('ls -la src'), { allowed: true });
  t.deepEqual(validateCommandOperation(''), { allowed: true });
});

// ========================================
// Configured lists
// ========================================

test('SecurityFilter merges configured entries with the defaults', t => {
  const filter = new SecurityFilter({
    dangerousFiles: ['vault.key'],
    dangerousDirectories: ['private-data'],
  });

  t.true(filter.isDangerousFile('keys/vault.key'));
  t.true(filter.isDangerousDirectory('work/private-data/a.csv'));
  t.true(filter.isDangerousFile('.env'));
  t.false(isDangerousFile('keys/vault.key'));
});
