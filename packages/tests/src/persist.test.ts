import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, Either } from "effect";
import {
  BasicTokenizer,
  RegexTokenizer,
  GPT4_SPLIT_PATTERN,
  baseVocabulary,
  formatModel,
  formatVocab,
  loadTokenizer,
  parseModel,
} from "@bytepair/tokenizers";

const CORPUS =
  "A small corpus: the river ran past the mill, the mill ground the grain, " +
  "and the grain fed the town by the river. 100 sacks, 200 sacks, 300 sacks.";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "bytepair-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("model format", () => {
  it("writes the pattern line then one merge per line", () => {
    expect(formatModel({ pattern: "", merges: [[97, 97], [97, 98]] })).toBe("\n97 97\n97 98\n");
    expect(formatModel({ pattern: "\\s+", merges: [] })).toBe("\\s+\n");
  });

  it("skips malformed merge lines", () => {
    const model = parseModel("p\n1 2\nbad line\n3\n4 x\n 5   6 \n\n-1 2\n7 8 9\n");
    expect(model).toEqual({ pattern: "p", merges: [[1, 2], [5, 6]] });
  });

  it("accepts CRLF line endings", () => {
    expect(parseModel("pat\r\n97 97\r\n")).toEqual({ pattern: "pat", merges: [[97, 97]] });
  });

  it("renders vocab lines with control bytes escaped", () => {
    const lines = formatVocab(baseVocabulary()).split("\n");
    expect(lines.length).toBe(257); // trailing newline
    expect(lines[0]).toBe("0 [\\x00]");
    expect(lines[10]).toBe("10 [\\x0a]");
    expect(lines[32]).toBe("32 [ ]");
    expect(lines[65]).toBe("65 [A]");
    expect(lines[127]).toBe("127 [\\x7f]");
    expect(lines[233]).toBe("233 [é]");
  });
});

describe("save / load", () => {
  it("round-trips a basic tokenizer", async () => {
    const tok = new BasicTokenizer();
    Effect.runSync(tok.train(CORPUS, 290));
    const prefix = join(dir, "basic");
    await Effect.runPromise(tok.save(prefix));

    const model = await readFile(`${prefix}.model`, "utf-8");
    expect(model.split("\n")[0]).toBe("");
    expect(model.split("\n")[1]).toBe(tok.merges()[0].join(" "));

    const loaded = new BasicTokenizer();
    await Effect.runPromise(loaded.load(`${prefix}.model`));
    expect(loaded.merges()).toEqual(tok.merges());
    expect(loaded.vocabSize).toBe(tok.vocabSize);
    for (let id = 0; id < tok.vocabSize; id++) {
      expect(loaded.token(id)).toEqual(tok.token(id));
    }
    expect(Array.from(loaded.encode(CORPUS))).toEqual(Array.from(tok.encode(CORPUS)));
  });

  it("round-trips a regex tokenizer and its pattern", async () => {
    const tok = new RegexTokenizer();
    Effect.runSync(tok.train(CORPUS, 290));
    const prefix = join(dir, "nested", "regex");
    await Effect.runPromise(tok.save(prefix));

    const loaded = new RegexTokenizer(String.raw`\S+|\s+`);
    await Effect.runPromise(loaded.load(`${prefix}.model`));
    expect(loaded.pattern).toBe(GPT4_SPLIT_PATTERN);
    expect(loaded.merges()).toEqual(tok.merges());
    expect(loaded.splitChunks("the mill")).toEqual(["the", " mill"]);
    expect(Array.from(loaded.encode(CORPUS))).toEqual(Array.from(tok.encode(CORPUS)));
  });

  it("writes one vocab line per token", async () => {
    const tok = new BasicTokenizer();
    Effect.runSync(tok.train("aaabdaaabac", 258));
    const prefix = join(dir, "small");
    await Effect.runPromise(tok.save(prefix));

    const lines = (await readFile(`${prefix}.vocab`, "utf-8")).split("\n");
    expect(lines[256]).toBe("256 [aa]");
    expect(lines[257]).toBe("257 [ab]");
    expect(lines[258]).toBe("");
  });

  it("assigns ids by line order on load", async () => {
    const path = join(dir, "manual.model");
    await writeFile(path, "\n104 105\nnot a merge\n256 33\n", "utf-8");
    const tok = new BasicTokenizer();
    await Effect.runPromise(tok.load(path));
    expect(tok.merges()).toEqual([[104, 105], [256, 33]]);
    expect(tok.decode([257])).toBe("hi!");
  });

  it("picks the variant from the pattern line", async () => {
    const basic = new BasicTokenizer();
    const regex = new RegexTokenizer();
    Effect.runSync(basic.train(CORPUS, 270));
    Effect.runSync(regex.train(CORPUS, 270));
    await Effect.runPromise(basic.save(join(dir, "b")));
    await Effect.runPromise(regex.save(join(dir, "r")));

    const b = await Effect.runPromise(loadTokenizer(join(dir, "b.model")));
    const r = await Effect.runPromise(loadTokenizer(join(dir, "r.model")));
    expect(b.name).toBe("basic");
    expect(r.name).toBe("regex");
    expect(b.merges()).toEqual(basic.merges());
    expect(r.merges()).toEqual(regex.merges());
  });

  it("rejects paths that are not .model files", async () => {
    const result = await Effect.runPromise(Effect.either(new BasicTokenizer().load(join(dir, "x.vocab"))));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) expect(result.left._tag).toBe("PersistenceError");
  });

  it("reports a missing file", async () => {
    const result = await Effect.runPromise(Effect.either(new BasicTokenizer().load(join(dir, "missing.model"))));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("PersistenceError");
      expect(result.left.message).toContain("missing.model");
    }
  });

  it("fails on an out-of-order merge table and keeps the old state", async () => {
    const path = join(dir, "corrupt.model");
    await writeFile(path, "\n300 97\n", "utf-8");
    const tok = new BasicTokenizer();
    Effect.runSync(tok.train("aaaa", 257));

    const result = await Effect.runPromise(Effect.either(tok.load(path)));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) expect(result.left._tag).toBe("VocabularyError");
    expect(tok.merges()).toEqual([[97, 97]]);
  });

  it("fails on duplicate merges", async () => {
    const path = join(dir, "dup.model");
    await writeFile(path, "\n97 97\n97 97\n", "utf-8");
    const result = await Effect.runPromise(Effect.either(new BasicTokenizer().load(path)));
    expect(Either.isLeft(result) && result.left._tag).toBe("VocabularyError");
  });

  it("refuses to load a basic model into a regex tokenizer", async () => {
    const path = join(dir, "plain.model");
    await writeFile(path, "\n97 97\n", "utf-8");
    const result = await Effect.runPromise(Effect.either(new RegexTokenizer().load(path)));
    expect(Either.isLeft(result) && result.left._tag).toBe("PersistenceError");
  });

  it("drops the pattern when a regex model is loaded in basic mode", async () => {
    const regex = new RegexTokenizer();
    Effect.runSync(regex.train(CORPUS, 270));
    await Effect.runPromise(regex.save(join(dir, "r")));

    const basic = new BasicTokenizer();
    await Effect.runPromise(basic.load(join(dir, "r.model")));
    expect(basic.pattern).toBe("");
    expect(basic.merges()).toEqual(regex.merges());

    await Effect.runPromise(basic.save(join(dir, "b")));
    const model = await readFile(join(dir, "b.model"), "utf-8");
    expect(model.split("\n")[0]).toBe("");
    const reopened = await Effect.runPromise(loadTokenizer(join(dir, "b.model")));
    expect(reopened.name).toBe("basic");
  });

  it("rejects an invalid splitting pattern and keeps the old state", () => {
    const tok = new RegexTokenizer();
    Effect.runSync(tok.train("aaaa", 257));
    const result = Effect.runSync(Effect.either(tok.restore(parseModel("(\n97 98\n"))));
    expect(Either.isLeft(result) && result.left._tag).toBe("PersistenceError");
    expect(tok.mergeCount).toBe(1);
    expect(tok.merges()).toEqual([[97, 97]]);
    expect(tok.pattern).toBe(GPT4_SPLIT_PATTERN);
  });

  it("reports a save into an unwritable location", async () => {
    const blocker = join(dir, "file");
    await writeFile(blocker, "x", "utf-8");
    // parent "directory" is a regular file
    const result = await Effect.runPromise(Effect.either(new BasicTokenizer().save(join(blocker, "tok"))));
    expect(Either.isLeft(result) && result.left._tag).toBe("PersistenceError");
  });
});
