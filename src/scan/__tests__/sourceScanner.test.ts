import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { isGeneratedSource, scanSourceFiles } from '../sourceScanner';

async function mkFile(p: string, content = 'class X { }'): Promise<void> {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, content, 'utf8');
}

async function mkTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), 'mvvm-migrate-scan-'));
}

describe('scanSourceFiles', () => {
  test('returns stable sorted C# sources only', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'ViewModels/b.cs'));
    await mkFile(path.join(dir, 'ViewModels/a.cs'));
    await mkFile(path.join(dir, 'App.xaml'), '<Application />');
    await mkFile(path.join(dir, 'App.csproj'), '<Project />');

    const r1 = await scanSourceFiles({ sourceRoot: dir });
    const r2 = await scanSourceFiles({ sourceRoot: dir });

    expect(r1).toEqual(r2);
    expect(r1).toEqual(['ViewModels/a.cs', 'ViewModels/b.cs']);
  });

  test('default excludes remove build output and generated files unless includeGenerated=true', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'Main.cs'));
    await mkFile(path.join(dir, 'bin/Debug/Out.cs'));
    await mkFile(path.join(dir, 'obj/Debug/Temp.cs'));
    await mkFile(path.join(dir, 'Main.g.cs'));
    await mkFile(path.join(dir, 'Form1.Designer.cs'));

    expect(await scanSourceFiles({ sourceRoot: dir })).toEqual(['Main.cs']);
    expect(await scanSourceFiles({ sourceRoot: dir, includeGenerated: true })).toEqual([
      'Form1.Designer.cs',
      'Main.cs',
      'Main.g.cs',
    ]);
  });

  test('additional excludes and the file cap are applied', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'a.cs'));
    await mkFile(path.join(dir, 'b.cs'));
    await mkFile(path.join(dir, 'legacy/old.cs'));

    expect(await scanSourceFiles({ sourceRoot: dir, excludeGlobs: ['legacy/**'] })).toEqual(['a.cs', 'b.cs']);
    expect(await scanSourceFiles({ sourceRoot: dir, maxFiles: 2 })).toEqual(['a.cs', 'b.cs']);
  });
});

describe('isGeneratedSource', () => {
  test('recognizes the auto-generated banner below other header comments', () => {
    expect(isGeneratedSource('// <auto-generated />\nclass A { }\n')).toBe(true);
    expect(isGeneratedSource('\uFEFF//------\r\n// <auto-generated>\r\n//------\r\nclass A { }\r\n')).toBe(true);
  });

  test('ignores the banner once code has started', () => {
    expect(isGeneratedSource('class A { }\n// <auto-generated />\n')).toBe(false);
    expect(isGeneratedSource('using System;\n')).toBe(false);
  });
});
