import { mkdir, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { timelineCsv, type Role, type StepMark } from "federation-sdk";

const fileName = (role: Role, n: number) => `federation_events_${role}_test_${n}.csv`;

/**
 * Writes run timelines as `<dir>/<role>/federation_events_<role>_test_<n>.csv`,
 * numbering each file one past the highest index already present.
 */
export class ExperimentStore {
  constructor(readonly dir: string) {}

  async nextIndex(role: Role): Promise<number> {
    const pattern = new RegExp(`^federation_events_${role}_test_(\\d+)\\.csv$`);
    let names: string[];
    try {
      names = await readdir(path.join(this.dir, role));
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return 1;
      throw e;
    }
    let highest = 0;
    for (const name of names) {
      const m = pattern.exec(name);
      if (m) highest = Math.max(highest, Number(m[1]));
    }
    return highest + 1;
  }

  async export(role: Role, marks: readonly StepMark[]): Promise<string> {
    const roleDir = path.join(this.dir, role);
    await mkdir(roleDir, { recursive: true });
    const file = path.join(roleDir, fileName(role, await this.nextIndex(role)));
    await writeFile(file, timelineCsv(marks), "utf8");
    return file;
  }
}
