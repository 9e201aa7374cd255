import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import process from 'node:process';
import { canPrompt, promptSecret } from '../lib/interactive.js';
import { configDir } from '../config/config.js';
import { AuthError } from '../errors.js';

// Credentials live in an AES-256-GCM encrypted file beside the config file,
// one entry per account, each with its own salt and IV.

const SERVICE = 'gitport';

type EncEntry = { salt: string; iv: string; data: string };
type EncPayloadV1 = { v: 1; entries: Record<string, EncEntry> };

let cachedPassphrase: string | undefined;

export function secretsFile(): string {
  return path.join(configDir(), 'secrets.json');
}

function isEncEntry(value: unknown): value is EncEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'salt' in value &&
    typeof value.salt === 'string' &&
    'iv' in value &&
    typeof value.iv === 'string' &&
    'data' in value &&
    typeof value.data === 'string'
  );
}

function readEncFile(): EncPayloadV1 {
  const file = secretsFile();
  if (!fs.existsSync(file)) {
    return { v: 1, entries: {} };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Secret store ${file} is unreadable: ${message}`);
  }
  const entries: Record<string, EncEntry> = {};
  if (typeof parsed === 'object' && parsed !== null && 'entries' in parsed) {
    const raw = parsed.entries;
    if (typeof raw === 'object' && raw !== null) {
      for (const [key, value] of Object.entries(raw)) {
        if (isEncEntry(value)) entries[key] = value;
      }
    }
  }
  return { v: 1, entries };
}

function writeEncFile(payload: EncPayloadV1): void {
  const file = secretsFile();
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const json = JSON.stringify(payload, null, 2);
  fs.writeFileSync(file, json + (json.endsWith('\n') ? '' : '\n'), { mode: 0o600 });
}

async function promptAndConfirm(initialPrompt: string): Promise<string> {
  while (true) {
    const first = (await promptSecret(initialPrompt)).trim();
    if (first === '') {
      console.log('Passphrase is required.');
      continue;
    }
    const second = (await promptSecret('Confirm passphrase')).trim();
    if (first !== second) {
      console.log('Passphrases did not match. Try again.');
      continue;
    }
    return first;
  }
}

async function resolvePassphrase(creating: boolean): Promise<string | undefined> {
  if (cachedPassphrase) return cachedPassphrase;
  const env = process.env.GITPORT_PASSPHRASE;
  if (env && env.trim() !== '') return env;
  if (!canPrompt()) return undefined;
  const pass = creating
    ? await promptAndConfirm('Create a passphrase to protect tokens')
    : (await promptSecret('Enter passphrase to unlock secure store')).trim();
  cachedPassphrase = pass === '' ? undefined : pass;
  return cachedPassphrase;
}

function deriveKey(passphrase: string, salt: Buffer): Buffer {
  // Node's default scrypt cost with a larger memory budget.
  return crypto.scryptSync(passphrase, salt, 32, {
    N: 1 << 14,
    r: 8,
    p: 1,
    maxmem: 128 * 1024 * 1024,
  });
}

export function encrypt(passphrase: string, plaintext: string): EncEntry {
  const salt = crypto.randomBytes(16);
  const key = deriveKey(passphrase, salt);
  const iv = crypto.randomBytes(12);
  const cipher = crypto.createCipheriv('aes-256-gcm', key, iv);
  const enc = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  const tag = cipher.getAuthTag();
  const payload = Buffer.concat([enc, tag]);
  return { salt: salt.toString('base64'), iv: iv.toString('base64'), data: payload.toString('base64') };
}

/** Returns `undefined` when the passphrase does not open the entry. */
export function decrypt(passphrase: string, entry: EncEntry): string | undefined {
  const salt = Buffer.from(entry.salt, 'base64');
  const iv = Buffer.from(entry.iv, 'base64');
  const data = Buffer.from(entry.data, 'base64');
  const key = deriveKey(passphrase, salt);
  const tag = data.subarray(data.length - 16);
  const enc = data.subarray(0, data.length - 16);
  const decipher = crypto.createDecipheriv('aes-256-gcm', key, iv);
  decipher.setAuthTag(tag);
  try {
    return Buffer.concat([decipher.update(enc), decipher.final()]).toString('utf8');
  } catch (error) {
    if (error instanceof Error && /authenticate/i.test(error.message)) return undefined;
    throw error;
  }
}

function entryKey(account: string): string {
  return `${SERVICE}:${account}`;
}

export async function getSecret(account: string): Promise<string | undefined> {
  const entry = readEncFile().entries[entryKey(account)];
  if (!entry) return undefined;
  const pass = await resolvePassphrase(false);
  if (!pass) {
    throw new AuthError('NotLoggedIn', 'A passphrase is required to unlock stored tokens. Set GITPORT_PASSPHRASE.');
  }
  const value = decrypt(pass, entry);
  if (value === undefined) {
    cachedPassphrase = undefined;
    throw new AuthError('NotLoggedIn', `Stored token for ${account} could not be decrypted; wrong passphrase?`);
  }
  return value;
}

export async function setSecret(account: string, value: string): Promise<void> {
  const db = readEncFile();
  const pass = await resolvePassphrase(Object.keys(db.entries).length === 0);
  if (!pass) throw new AuthError('NotLoggedIn', 'A passphrase is required to store tokens. Set GITPORT_PASSPHRASE.');
  db.entries[entryKey(account)] = encrypt(pass, value);
  writeEncFile(db);
}

export function deleteSecret(account: string): boolean {
  const db = readEncFile();
  const key = entryKey(account);
  if (!db.entries[key]) return false;
  delete db.entries[key];
  writeEncFile(db);
  return true;
}

export function listAccounts(): string[] {
  const prefix = `${SERVICE}:`;
  return Object.keys(readEncFile().entries)
    .filter((k) => k.startsWith(prefix))
    .map((k) => k.slice(prefix.length))
    .sort();
}

export function backendName(): string {
  return 'encrypted-file';
}

/** Forgets the passphrase remembered for this process. */
export function resetPassphraseCache(): void {
  cachedPassphrase = undefined;
}
