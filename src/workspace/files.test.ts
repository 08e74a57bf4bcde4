import fs from "fs";
import path from "path";
import { StoreError } from "../errors";
import { makeTempWorkspace, removeTempWorkspace } from "../test-support/artifacts";
import { errnoCode, listDirectories, listFiles, readJsonIfExists, readTextIfExists, writeJsonAtomic } from "./files";

describe("errnoCode", () => {
  it("reads the code from any error-shaped value", () => {
    expect(errnoCode({ code: "ENOENT", message: "no such file" })).toBe("ENOENT");
    expect(errnoCode(Object.assign(new Error("exists"), { code: "EEXIST" }))).toBe("EEXIST");
  });

  it("returns undefined when there is no string code", () => {
    expect(errnoCode(new Error("plain"))).toBeUndefined();
    expect(errnoCode({ code: 2 })).toBeUndefined();
    expect(errnoCode(null)).toBeUndefined();
    expect(errnoCode("ENOENT")).toBeUndefined();
  });
});

describe("workspace files", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempWorkspace("files");
  });

  afterEach(() => {
    removeTempWorkspace(dir);
  });

  it("treats missing files and directories as empty", async () => {
    await expect(readTextIfExists(path.join(dir, "missing.json"))).resolves.toBeNull();
    await expect(readJsonIfExists(path.join(dir, ".specloop", "index.json"))).resolves.toBeNull();
    await expect(listDirectories(path.join(dir, "specs"))).resolves.toEqual([]);
    await expect(listFiles(path.join(dir, "artifacts"))).resolves.toEqual([]);
  });

  it("writes JSON without leaving temp files behind", async () => {
    const target = path.join(dir, "nested", "value.json");
    await writeJsonAtomic(target, { a: 1 });
    expect(fs.readFileSync(target, "utf-8")).toBe('{\n  "a": 1\n}\n');
    expect(fs.readdirSync(path.dirname(target))).toEqual(["value.json"]);
  });

  it("reports corrupt JSON as a store error", async () => {
    const target = path.join(dir, "broken.json");
    fs.writeFileSync(target, "{ not json", "utf-8");
    await expect(readJsonIfExists(target)).rejects.toBeInstanceOf(StoreError);
  });
});
