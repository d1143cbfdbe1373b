import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';

import { AuditLogger } from '../src/audit-log.js';
import { SessionStore } from '../src/auth.js';
import { FolderMapStore } from '../src/folder-map.js';
import { FileGateway } from '../src/gateway.js';
import { silentLogger } from '../src/logger.js';
import { LoginLockout } from '../src/security.js';
import { FileUserStore } from '../src/users.js';

interface TestGateway {
  baseUrl: string;
  root: string;
  dir: string;
  gateway: FileGateway;
  auditDir: string;
  /** Stops the listener and flushes the audit log, keeping the files. */
  stop(): Promise<void>;
  close(): Promise<void>;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJson(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  assert.ok(isJsonObject(body));
  return body;
}

async function startGateway(options: { withLanding?: boolean; uploadLimitBytes?: number } = {}): Promise<TestGateway> {
  const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'vfs-gateway-')));
  const root = path.join(dir, 'www');
  const publicDir = path.join(dir, 'public');
  const auditDir = path.join(dir, 'audit');
  fs.mkdirSync(publicDir);
  if (options.withLanding !== false) {
    fs.writeFileSync(path.join(publicDir, 'index.html'), '<h1>gateway</h1>');
  }

  const users = new FileUserStore({
    filePath: path.join(dir, 'users.json'),
    lockout: new LoginLockout({ maxFailures: 3, lockMs: 60_000 })
  });
  await users.createAccount('alice', 'test-secret');
  await users.createAccount('admin', 'test-secret', 'admin');

  const auditLogger = new AuditLogger({ dir: auditDir });
  const gateway = new FileGateway({
    host: '127.0.0.1',
    port: 0,
    rootDir: root,
    publicDir,
    uploadLimitBytes: options.uploadLimitBytes ?? 1024 * 1024,
    loginRateLimitPerMinute: 100,
    sessions: new SessionStore(),
    folders: new FolderMapStore(path.join(dir, 'folders.json')),
    credentials: users,
    users,
    auditLogger,
    logger: silentLogger
  });
  const address = await gateway.start();

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    root,
    dir,
    gateway,
    auditDir,
    async stop() {
      await gateway.stop();
      await auditLogger.flush();
    },
    async close(this: TestGateway) {
      await this.stop();
      fs.rmSync(dir, { recursive: true, force: true });
    }
  };
}

async function login(baseUrl: string, username = 'alice', password = 'test-secret'): Promise<string> {
  const res = await fetch(`${baseUrl}/api/login`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ username, password })
  });
  assert.equal(res.status, 200);
  const { token } = await readJson(res);
  assert.ok(typeof token === 'string');
  return token;
}

function authed(token: string, extra: Record<string, string> = {}): Record<string, string> {
  return { Authorization: `Bearer ${token}`, ...extra };
}

async function postJson(baseUrl: string, route: string, token: string, payload: unknown): Promise<Response> {
  return fetch(`${baseUrl}${route}`, {
    method: 'POST',
    headers: authed(token, { 'Content-Type': 'application/json' }),
    body: JSON.stringify(payload)
  });
}

function multipartBody(boundary: string, disposition: string, content: string): Buffer {
  return Buffer.from(
    `--${boundary}\r\nContent-Disposition: ${disposition}\r\nContent-Type: text/plain\r\n\r\n${content}\r\n--${boundary}--\r\n`
  );
}

test('gateway: login then list an empty sandbox', async () => {
  const gw = await startGateway();
  try {
    const res = await fetch(`${gw.baseUrl}/api/login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ username: 'alice', password: 'test-secret' })
    });
    assert.equal(res.status, 200);
    const body = await readJson(res);
    assert.equal(body.success, true);
    assert.equal(body.username, 'alice');
    assert.equal(typeof body.expiresAt, 'string');
    assert.equal(fs.statSync(path.join(gw.root, 'alice')).isDirectory(), true);

    assert.ok(typeof body.token === 'string');
    const list = await fetch(`${gw.baseUrl}/api/files/list`, { headers: authed(body.token) });
    assert.equal(list.status, 200);
    assert.equal(list.headers.get('access-control-allow-origin'), '*');
    assert.deepEqual(await readJson(list), { success: true, path: '/', items: [] });
  } finally {
    await gw.close();
  }
});

test('gateway: login accepts capitalized field names', async () => {
  const gw = await startGateway();
  try {
    const res = await fetch(`${gw.baseUrl}/api/login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ Username: 'alice', Password: 'test-secret' })
    });
    assert.equal(res.status, 200);
    assert.equal((await readJson(res)).username, 'alice');
  } finally {
    await gw.close();
  }
});

test('gateway: login rejects malformed and wrong credentials', async () => {
  const gw = await startGateway();
  try {
    const missing = await fetch(`${gw.baseUrl}/api/login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ username: 'alice' })
    });
    assert.equal(missing.status, 400);
    assert.deepEqual(await readJson(missing), { success: false, message: 'Invalid request format' });

    const broken = await fetch(`${gw.baseUrl}/api/login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"username":'
    });
    assert.equal(broken.status, 400);
    assert.deepEqual(await readJson(broken), { success: false, message: 'Invalid JSON body' });

    const unknown = await postJson(gw.baseUrl, '/api/login', '', { username: 'ghost', password: 'test-secret' });
    assert.equal(unknown.status, 401);
    assert.deepEqual(await readJson(unknown), { success: false, message: 'Invalid credentials' });
  } finally {
    await gw.close();
  }
});

test('gateway: repeated bad passwords lock the account', async () => {
  const gw = await startGateway();
  try {
    for (let i = 0; i < 3; i += 1) {
      const res = await postJson(gw.baseUrl, '/api/login', '', { username: 'alice', password: 'wrong' });
      assert.equal(res.status, 401);
      assert.deepEqual(await readJson(res), { success: false, message: 'Invalid credentials' });
    }

    const locked = await postJson(gw.baseUrl, '/api/login', '', { username: 'alice', password: 'test-secret' });
    assert.equal(locked.status, 401);
    assert.deepEqual(await readJson(locked), { success: false, message: 'Too many tries' });
  } finally {
    await gw.close();
  }
});

test('gateway: create file then list it', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);

    const created = await postJson(gw.baseUrl, '/api/files/create', token, { path: '/notes.txt', isDirectory: false });
    assert.equal(created.status, 200);
    assert.deepEqual(await readJson(created), { success: true, message: 'Item created successfully.' });

    const again = await postJson(gw.baseUrl, '/api/files/create', token, { path: '/notes.txt', isDirectory: false });
    assert.equal(again.status, 409);
    assert.deepEqual(await readJson(again), { success: false, message: 'An item with this name already exists.' });

    const folder = await fetch(`${gw.baseUrl}/api/files/create?path=${encodeURIComponent('/photos')}`, {
      method: 'POST',
      headers: authed(token)
    });
    assert.equal(folder.status, 200);

    const list = await fetch(`${gw.baseUrl}/api/files/list?path=/`, { headers: authed(token) });
    const body = await readJson(list);
    assert.equal(body.path, '/');
    const items = body.items;
    assert.ok(Array.isArray(items));
    assert.deepEqual(
      items.map(({ name, isDirectory, size }) => [name, isDirectory, size]),
      [
        ['photos', true, 0],
        ['notes.txt', false, 0]
      ]
    );
    assert.equal(typeof items[0].lastModified, 'string');
  } finally {
    await gw.close();
  }
});

test('gateway: create requires a path', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);
    const res = await postJson(gw.baseUrl, '/api/files/create', token, { isDirectory: true });
    assert.equal(res.status, 400);
    assert.deepEqual(await readJson(res), { success: false, message: 'Path is required.' });
  } finally {
    await gw.close();
  }
});

test('gateway: save then download with attachment headers', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);
    const saved = await postJson(gw.baseUrl, '/api/files/save', token, { path: '/docs/readme.txt', content: 'hello world' });
    assert.equal(saved.status, 200);
    assert.deepEqual(await readJson(saved), { success: true, message: 'File saved successfully.' });

    const res = await fetch(`${gw.baseUrl}/api/files/download?path=/docs/readme.txt`, { headers: authed(token) });
    assert.equal(res.status, 200);
    assert.equal(res.headers.get('content-type'), 'text/plain');
    assert.equal(res.headers.get('content-length'), '11');
    assert.equal(res.headers.get('content-disposition'), `attachment; filename="readme.txt"; filename*=UTF-8''readme.txt`);
    assert.equal(await res.text(), 'hello world');

    const missing = await fetch(`${gw.baseUrl}/api/files/download?path=/docs/none.txt`, { headers: authed(token) });
    assert.equal(missing.status, 404);
    assert.deepEqual(await readJson(missing), { success: false, message: 'File not found' });

    const dir = await fetch(`${gw.baseUrl}/api/files/download?path=/docs`, { headers: authed(token) });
    assert.equal(dir.status, 404);
  } finally {
    await gw.close();
  }
});

test('gateway: save requires path and content', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);
    const res = await postJson(gw.baseUrl, '/api/files/save', token, { path: '/a.txt' });
    assert.equal(res.status, 400);
    assert.deepEqual(await readJson(res), { success: false, message: 'Path and content are required.' });
  } finally {
    await gw.close();
  }
});

test('gateway: rename onto an existing item is a conflict', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);
    await postJson(gw.baseUrl, '/api/files/save', token, { path: '/a.txt', content: 'A' });
    await postJson(gw.baseUrl, '/api/files/save', token, { path: '/b.txt', content: 'B' });

    const clash = await postJson(gw.baseUrl, '/api/files/rename', token, { path: '/a.txt', newName: 'b.txt', isDirectory: false });
    assert.equal(clash.status, 409);
    assert.deepEqual(await readJson(clash), { success: false, message: 'An item with this name already exists.' });
    assert.equal(fs.readFileSync(path.join(gw.root, 'alice', 'b.txt'), 'utf8'), 'B');

    const renamed = await postJson(gw.baseUrl, '/api/files/rename', token, { path: '/a.txt', newName: 'c.txt', isDirectory: false });
    assert.equal(renamed.status, 200);
    assert.deepEqual(await readJson(renamed), { success: true, message: 'Item renamed successfully.' });
    assert.equal(fs.existsSync(path.join(gw.root, 'alice', 'a.txt')), false);
    assert.equal(fs.readFileSync(path.join(gw.root, 'alice', 'c.txt'), 'utf8'), 'A');
  } finally {
    await gw.close();
  }
});

test('gateway: rename validates its fields', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);
    await postJson(gw.baseUrl, '/api/files/save', token, { path: '/a.txt', content: 'A' });

    const missing = await postJson(gw.baseUrl, '/api/files/rename', token, { path: '/a.txt', newName: 'b.txt' });
    assert.equal(missing.status, 400);
    assert.deepEqual(await readJson(missing), { success: false, message: 'Path, newName, and isDirectory are required.' });

    const escaping = await postJson(gw.baseUrl, '/api/files/rename', token, { path: '/a.txt', newName: '../b.txt', isDirectory: false });
    assert.equal(escaping.status, 400);
    assert.deepEqual(await readJson(escaping), { success: false, message: 'Invalid name.' });

    const kind = await postJson(gw.baseUrl, '/api/files/rename', token, { path: '/a.txt', newName: 'b', isDirectory: true });
    assert.equal(kind.status, 400);
    assert.deepEqual(await readJson(kind), { success: false, message: 'Path is not a directory' });

    const ghost = await postJson(gw.baseUrl, '/api/files/rename', token, { path: '/nope.txt', newName: 'b.txt', isDirectory: 'false' });
    assert.equal(ghost.status, 404);
    assert.deepEqual(await readJson(ghost), { success: false, message: 'Item not found' });
  } finally {
    await gw.close();
  }
});

test('gateway: upload stores the file part', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);
    const res = await fetch(`${gw.baseUrl}/api/files/upload?path=/inbox`, {
      method: 'POST',
      headers: authed(token, { 'Content-Type': 'multipart/form-data; boundary=xyz' }),
      body: multipartBody('xyz', 'form-data; name="file"; filename="a.txt"', 'hi')
    });
    assert.equal(res.status, 200);
    assert.deepEqual(await readJson(res), { success: true, filename: 'a.txt', size: 2 });
    assert.equal(fs.readFileSync(path.join(gw.root, 'alice', 'inbox', 'a.txt'), 'utf8'), 'hi');
  } finally {
    await gw.close();
  }
});

test('gateway: upload without a filename writes nothing', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);
    const res = await fetch(`${gw.baseUrl}/api/files/upload?path=/inbox`, {
      method: 'POST',
      headers: authed(token, { 'Content-Type': 'multipart/form-data; boundary=xyz' }),
      body: multipartBody('xyz', 'form-data; name="file"', 'hi')
    });
    assert.equal(res.status, 400);
    assert.deepEqual(await readJson(res), { success: false, message: 'No filename found' });
    assert.deepEqual(fs.readdirSync(path.join(gw.root, 'alice')), []);
  } finally {
    await gw.close();
  }
});

test('gateway: delete files and folders', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);
    await postJson(gw.baseUrl, '/api/files/save', token, { path: '/docs/a.txt', content: 'A' });
    const remove = (query: string): Promise<Response> =>
      fetch(`${gw.baseUrl}/api/files/delete?${query}`, { method: 'POST', headers: authed(token) });

    const rootDelete = await remove('path=/&isDir=true');
    assert.equal(rootDelete.status, 400);
    assert.deepEqual(await readJson(rootDelete), { success: false, message: 'Cannot delete the root folder' });

    const wrongKind = await remove('path=/docs');
    assert.equal(wrongKind.status, 400);
    assert.deepEqual(await readJson(wrongKind), { success: false, message: 'Path is a directory' });

    const file = await remove('path=/docs/a.txt&isDir=false');
    assert.equal(file.status, 200);
    assert.deepEqual(await readJson(file), { success: true });

    const gone = await remove('path=/docs/a.txt');
    assert.equal(gone.status, 404);
    assert.deepEqual(await readJson(gone), { success: false, message: 'Item not found' });

    const folder = await remove('path=/docs&isDir=true');
    assert.equal(folder.status, 200);
    assert.equal(fs.existsSync(path.join(gw.root, 'alice', 'docs')), false);
  } finally {
    await gw.close();
  }
});

test('gateway: missing or unknown tokens are unauthorized', async () => {
  const gw = await startGateway();
  try {
    const bare = await fetch(`${gw.baseUrl}/api/files/list`);
    assert.equal(bare.status, 401);
    assert.equal(bare.headers.get('www-authenticate'), 'Bearer');
    assert.deepEqual(await readJson(bare), { success: false, message: 'Unauthorized' });

    const forged = await fetch(`${gw.baseUrl}/api/files/list`, { headers: authed('forged-token') });
    assert.equal(forged.status, 401);
  } finally {
    await gw.close();
  }
});

test('gateway: traversal and cross-tenant paths are refused', async () => {
  const gw = await startGateway();
  try {
    const admin = await login(gw.baseUrl, 'admin');
    await postJson(gw.baseUrl, '/api/files/save', admin, { path: '/bob/secret.txt', content: 'S' });
    const token = await login(gw.baseUrl);

    const up = await fetch(`${gw.baseUrl}/api/files/download?path=${encodeURIComponent('/../bob/secret.txt')}`, {
      headers: authed(token)
    });
    assert.equal(up.status, 401);
    assert.deepEqual(await readJson(up), { success: false, message: 'Unauthorized' });

    const backslash = await fetch(`${gw.baseUrl}/api/files/list?path=${encodeURIComponent('..\\bob')}`, {
      headers: authed(token)
    });
    assert.equal(backslash.status, 401);

    const own = await fetch(`${gw.baseUrl}/api/files/download?path=/bob/secret.txt`, { headers: authed(token) });
    assert.equal(own.status, 404);
  } finally {
    await gw.close();
  }
});

test('gateway: admin sees every sandbox from the root', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);
    await postJson(gw.baseUrl, '/api/files/save', token, { path: '/notes.txt', content: 'mine' });

    const admin = await login(gw.baseUrl, 'admin');
    const res = await fetch(`${gw.baseUrl}/api/files/download?path=/alice/notes.txt`, { headers: authed(admin) });
    assert.equal(res.status, 200);
    assert.equal(await res.text(), 'mine');
  } finally {
    await gw.close();
  }
});

test('gateway: logout revokes the token and is idempotent', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);
    for (let i = 0; i < 2; i += 1) {
      const res = await fetch(`${gw.baseUrl}/api/logout`, { method: 'POST', headers: authed(token) });
      assert.equal(res.status, 200);
      assert.deepEqual(await readJson(res), { success: true });
    }

    const list = await fetch(`${gw.baseUrl}/api/files/list`, { headers: authed(token) });
    assert.equal(list.status, 401);
  } finally {
    await gw.close();
  }
});

test('gateway: preflight, unknown paths and wrong methods', async () => {
  const gw = await startGateway();
  try {
    const preflight = await fetch(`${gw.baseUrl}/api/files/list`, { method: 'OPTIONS' });
    assert.equal(preflight.status, 200);
    assert.equal(preflight.headers.get('access-control-allow-origin'), '*');
    assert.equal(preflight.headers.get('access-control-allow-methods'), 'POST, GET, OPTIONS, DELETE');
    assert.equal(preflight.headers.get('access-control-allow-headers'), 'Content-Type, Authorization');

    const unknown = await fetch(`${gw.baseUrl}/api/files/move`);
    assert.equal(unknown.status, 404);
    assert.deepEqual(await readJson(unknown), { success: false, message: 'Not found' });

    const upper = await fetch(`${gw.baseUrl}/API/login`, { method: 'POST' });
    assert.equal(upper.status, 404);

    const wrongMethod = await fetch(`${gw.baseUrl}/api/login`);
    assert.equal(wrongMethod.status, 405);
    assert.deepEqual(await readJson(wrongMethod), { success: false, message: 'Only POST allowed' });

    const unauthWrongMethod = await fetch(`${gw.baseUrl}/api/files/list`, { method: 'POST' });
    assert.equal(unauthWrongMethod.status, 405);
    assert.deepEqual(await readJson(unauthWrongMethod), { success: false, message: 'Only GET allowed' });
  } finally {
    await gw.close();
  }
});

test('gateway: landing page is served from the public directory', async () => {
  const gw = await startGateway();
  try {
    const res = await fetch(`${gw.baseUrl}/`);
    assert.equal(res.status, 200);
    assert.match(res.headers.get('content-type') ?? '', /^text\/html/);
    assert.equal(await res.text(), '<h1>gateway</h1>');
  } finally {
    await gw.close();
  }

  const bare = await startGateway({ withLanding: false });
  try {
    const res = await fetch(`${bare.baseUrl}/`);
    assert.equal(res.status, 404);
    assert.match(await res.text(), /Landing Page Not Found/);
  } finally {
    await bare.close();
  }
});

test('gateway: accounts created at runtime get their own folder', async () => {
  const gw = await startGateway();
  try {
    await gw.gateway.createUser('dave', 'test-secret');
    const folders = JSON.parse(fs.readFileSync(path.join(gw.dir, 'folders.json'), 'utf8'));
    assert.deepEqual(folders, { users: { admin: '/', dave: 'dave' } });

    const token = await login(gw.baseUrl, 'dave');
    assert.equal(fs.statSync(path.join(gw.root, 'dave')).isDirectory(), true);

    assert.equal(await gw.gateway.deleteUser('dave'), true);
    const list = await fetch(`${gw.baseUrl}/api/files/list`, { headers: authed(token) });
    assert.equal(list.status, 401);
    assert.equal(await gw.gateway.deleteUser('dave'), false);
  } finally {
    await gw.close();
  }
});

test('gateway: audit trail records logins and writes', async () => {
  const gw = await startGateway();
  const auditDir = gw.auditDir;
  try {
    const token = await login(gw.baseUrl);
    await postJson(gw.baseUrl, '/api/files/save', token, { path: '/a.txt', content: 'A' });
  } finally {
    await gw.stop();
  }

  try {
    const files = fs.readdirSync(auditDir).filter((name) => name.endsWith('.jsonl'));
    const events = files
      .flatMap((name) => fs.readFileSync(path.join(auditDir, name), 'utf8').trim().split('\n'))
      .map((line) => JSON.parse(line));
    assert.deepEqual(
      events.map((entry: { event: string; actor: string; resource: string }) => [entry.event, entry.actor, entry.resource]),
      [
        ['auth.login', 'user:alice', ''],
        ['fs.save', 'user:alice', '/a.txt']
      ]
    );
  } finally {
    fs.rmSync(gw.dir, { recursive: true, force: true });
  }
});

test('gateway: listing sorts each group by name', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);
    for (const name of ['b.txt', 'zeta', 'A.txt', 'alpha', 'a.txt']) {
      const isDirectory = !name.includes('.');
      const res = await postJson(gw.baseUrl, '/api/files/create', token, { path: `/${name}`, isDirectory });
      assert.equal(res.status, 200);
    }

    const body = await readJson(await fetch(`${gw.baseUrl}/api/files/list`, { headers: authed(token) }));
    const items = body.items;
    assert.ok(Array.isArray(items));
    assert.deepEqual(
      items.map(({ name, isDirectory }) => [name, isDirectory]),
      [
        ['alpha', true],
        ['zeta', true],
        ['A.txt', false],
        ['a.txt', false],
        ['b.txt', false]
      ]
    );
  } finally {
    await gw.close();
  }
});

test('gateway: filesystem faults answer 500 and the listener keeps serving', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);
    const res = await postJson(gw.baseUrl, '/api/files/save', token, { path: '/', content: 'x' });
    assert.equal(res.status, 500);

    const body = await readJson(res);
    assert.equal(body.success, false);
    assert.equal(Object.keys(body).sort().join(','), 'message,success');
    assert.ok(typeof body.message === 'string');
    assert.ok(body.message.startsWith('EISDIR'));
    assert.equal(body.message.includes('\n'), false);

    const next = await fetch(`${gw.baseUrl}/api/files/list`, { headers: authed(token) });
    assert.equal(next.status, 200);
    assert.deepEqual(await readJson(next), { success: true, path: '/', items: [] });
  } finally {
    await gw.close();
  }
});

test('gateway: uploads above the size limit are refused with 413', async () => {
  const gw = await startGateway({ uploadLimitBytes: 1024 });
  try {
    const token = await login(gw.baseUrl);
    const res = await fetch(`${gw.baseUrl}/api/files/upload?path=/`, {
      method: 'POST',
      headers: authed(token, { 'Content-Type': 'multipart/form-data; boundary=xyz' }),
      body: multipartBody('xyz', 'form-data; name="file"; filename="big.bin"', 'x'.repeat(4096))
    });
    assert.equal(res.status, 413);
    assert.deepEqual(await readJson(res), { success: false, message: 'Request body too large' });
    assert.equal(fs.existsSync(path.join(gw.root, 'alice', 'big.bin')), false);
  } finally {
    await gw.close();
  }
});

test('gateway: account changes made by another process reach the running server', async () => {
  const gw = await startGateway();
  try {
    const token = await login(gw.baseUrl);

    // A second gateway on the same files, as the useradd/userdel commands build it.
    const offlineUsers = new FileUserStore({ filePath: path.join(gw.dir, 'users.json') });
    const offlineAudit = new AuditLogger({ dir: gw.auditDir });
    const offline = new FileGateway({
      host: '127.0.0.1',
      port: 0,
      rootDir: gw.root,
      publicDir: path.join(gw.dir, 'public'),
      uploadLimitBytes: 1024,
      loginRateLimitPerMinute: 100,
      sessions: new SessionStore(),
      folders: new FolderMapStore(path.join(gw.dir, 'folders.json')),
      credentials: offlineUsers,
      users: offlineUsers,
      auditLogger: offlineAudit,
      logger: silentLogger
    });
    await offline.createUser('erin', 'test-secret');
    assert.equal(await offline.deleteUser('alice'), true);
    await offlineAudit.flush();

    const list = await fetch(`${gw.baseUrl}/api/files/list`, { headers: authed(token) });
    assert.equal(list.status, 401);

    const relogin = await postJson(gw.baseUrl, '/api/login', '', { username: 'alice', password: 'test-secret' });
    assert.equal(relogin.status, 401);
    assert.deepEqual(await readJson(relogin), { success: false, message: 'Invalid credentials' });

    await login(gw.baseUrl, 'erin');

    await gw.stop();
    const folders = JSON.parse(fs.readFileSync(path.join(gw.dir, 'folders.json'), 'utf8'));
    assert.deepEqual(folders, { users: { admin: '/', erin: 'erin' } });
  } finally {
    await gw.close();
  }
});
