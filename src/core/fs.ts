import { appendFile, chmod, mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';

export interface FileSystem {
  readText(path: string): Promise<string>;
  readJSON<T>(path: string): Promise<T>;
  writeText(path: string, content: string): Promise<void>;
  writeJSON(path: string, data: unknown): Promise<void>;
  appendText(path: string, content: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  list(dir: string): Promise<string[]>;
  mkdir(path: string): Promise<void>;
  chmod(path: string, mode: number): Promise<void>;
  remove(path: string): Promise<void>;
}

export class NodeFileSystem implements FileSystem {
  async readText(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  async readJSON<T>(path: string): Promise<T> {
    return JSON.parse(await this.readText(path)) as T;
  }

  async writeText(path: string, content: string): Promise<void> {
    await writeFile(path, content, 'utf8');
  }

  async writeJSON(path: string, data: unknown): Promise<void> {
    await writeFile(path, JSON.stringify(data, null, 2), 'utf8');
  }

  async appendText(path: string, content: string): Promise<void> {
    await appendFile(path, content, 'utf8');
  }

  async rename(from: string, to: string): Promise<void> {
    await rename(from, to);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch {
      return false;
    }
  }

  async list(dir: string): Promise<string[]> {
    if (!(await this.exists(dir))) return [];
    return readdir(dir);
  }

  async mkdir(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  async chmod(path: string, mode: number): Promise<void> {
    await chmod(path, mode);
  }

  async remove(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true });
  }
}

export class MockFileSystem implements FileSystem {
  private files = new Map<string, string>();

  async readText(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) throw new Error(`ENOENT: ${path}`);
    return content;
  }

  async readJSON<T>(path: string): Promise<T> {
    return JSON.parse(await this.readText(path)) as T;
  }

  async writeText(path: string, content: string): Promise<void> {
    this.files.set(path, content);
  }

  async writeJSON(path: string, data: unknown): Promise<void> {
    this.files.set(path, JSON.stringify(data, null, 2));
  }

  async appendText(path: string, content: string): Promise<void> {
    this.files.set(path, (this.files.get(path) ?? '') + content);
  }

  async rename(from: string, to: string): Promise<void> {
    const content = await this.readText(from);
    this.files.set(to, content);
    this.files.delete(from);
  }

  async exists(path: string): Promise<boolean> {
    if (this.files.has(path)) return true;
    const prefix = path.endsWith('/') ? path : `${path}/`;
    return [...this.files.keys()].some((k) => k.startsWith(prefix));
  }

  async list(dir: string): Promise<string[]> {
    const prefix = dir.endsWith('/') ? dir : `${dir}/`;
    const entries = new Set<string>();
    for (const key of this.files.keys()) {
      if (!key.startsWith(prefix)) continue;
      const [first] = key.slice(prefix.length).split('/');
      if (first) entries.add(first);
    }
    return [...entries].sort();
  }

  async mkdir(_path: string): Promise<void> {}

  async chmod(_path: string, _mode: number): Promise<void> {}

  async remove(target: string): Promise<void> {
    const prefix = target.endsWith('/') ? target : `${target}/`;
    for (const key of [...this.files.keys()]) {
      if (key === target || key.startsWith(prefix)) this.files.delete(key);
    }
  }

  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  getFile(path: string): string | undefined {
    return this.files.get(path);
  }

  getFiles(): Map<string, string> {
    return new Map(this.files);
  }
}
