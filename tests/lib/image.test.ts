import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  DEFAULT_IMAGE_LAYOUT,
  describeValidation,
  imageProbe,
  matchesAddonToken,
  validateImage,
} from '@/lib/image.js';
import { nodeFileProber } from '@/lib/fs.js';
import { createImageTree, makeTempDir, removeTempDir } from '../helpers/mocks.js';

const layout = DEFAULT_IMAGE_LAYOUT;

describe('matchesAddonToken', () => {
  it.each([
    { name: 'CommandSocket-addon', expected: true },
    { name: 'CommandSocket_v1', expected: true },
    { name: 'foo-at-automation-bar', expected: true },
    { name: 'at-automation', expected: true },
    { name: 'speech-addon', expected: false },
    { name: 'commandsocket', expected: false },
  ])('$name -> $expected', ({ name, expected }) => {
    expect(matchesAddonToken(name, layout.addon_tokens)).toBe(expected);
  });

  it('matches nothing without tokens', () => {
    expect(matchesAddonToken('at-automation', [])).toBe(false);
  });
});

describe('validateImage', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('accepts a complete image with a token-matching add-on', async () => {
    await createImageTree(root, layout, { addons: ['CommandSocket-addon'] });

    const validation = await validateImage(root, layout, nodeFileProber);

    expect(validation).toEqual({
      ok: true,
      missing: [],
      has_flag: true,
      has_addon: true,
      addon_dirs: ['CommandSocket-addon'],
    });
    expect(describeValidation(validation, layout)).toBe('image valid (add-ons: CommandSocket-addon)');
  });

  it('accepts an add-on directory that only contains the token', async () => {
    await createImageTree(root, layout, { addons: ['CommandSocket_v1'] });

    const validation = await validateImage(root, layout, nodeFileProber);

    expect(validation).toEqual({
      ok: true,
      missing: [],
      has_flag: true,
      has_addon: true,
      addon_dirs: ['CommandSocket_v1'],
    });
    expect(await imageProbe(root, layout, nodeFileProber, { retries: 0, interval_ms: 0 }).check()).toEqual({ ok: true });
  });

  it('returns equal results on repeated calls', async () => {
    await createImageTree(root, layout, { omit: ['locale'] });

    const first = await validateImage(root, layout, nodeFileProber);
    const second = await validateImage(root, layout, nodeFileProber);

    expect(second).toEqual(first);
  });

  it('lists missing members in layout order', async () => {
    await createImageTree(root, layout, { omit: ['locale', 'library.zip'] });

    const validation = await validateImage(root, layout, nodeFileProber);

    expect(validation.ok).toBe(false);
    expect(validation.missing).toEqual(['library.zip', 'locale']);
    expect(describeValidation(validation, layout)).toBe('missing library.zip, locale');
  });

  it('requires the marker inside the flag file', async () => {
    await createImageTree(root, layout, { flagText: 'version = 2024.4.2\n' });

    const validation = await validateImage(root, layout, nodeFileProber);

    expect(validation.has_flag).toBe(false);
    expect(validation.missing).toEqual([]);
    expect(describeValidation(validation, layout)).toBe('portable.ini lacks marker [portable]');
  });

  it('ignores add-ons without a matching token', async () => {
    await createImageTree(root, layout, { addons: ['speech-addon'] });
    await writeFile(join(root, layout.addons_dir, 'at-automation.txt'), 'not a directory');

    const validation = await validateImage(root, layout, nodeFileProber);

    expect(validation.has_addon).toBe(false);
    expect(validation.addon_dirs).toEqual([]);
    expect(describeValidation(validation, layout)).toBe(
      'no add-on matching CommandSocket or at-automation in userConfig/addons'
    );
  });

  it('reports every problem of an empty directory', async () => {
    const validation = await validateImage(root, layout, nodeFileProber);

    expect(describeValidation(validation, layout)).toBe(
      'missing nvda.exe, portable.ini, library.zip, synthDrivers, locale, userConfig/addons; ' +
        'portable.ini lacks marker [portable]; ' +
        'no add-on matching CommandSocket or at-automation in userConfig/addons'
    );
  });
});

describe('imageProbe', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('passes once the image is complete', async () => {
    const probe = imageProbe(root, layout, nodeFileProber, { retries: 1, interval_ms: 0 });
    expect(probe.name).toBe('portable-image');
    expect(probe.retries).toBe(1);

    await mkdir(join(root, 'synthDrivers'), { recursive: true });
    const before = await probe.check();
    expect(before.ok).toBe(false);

    await createImageTree(root, layout);
    expect(await probe.check()).toEqual({ ok: true });
  });
});
