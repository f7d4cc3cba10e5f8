import { describe, it, expect, beforeEach } from "@jest/globals";
import { InMemoryBibleDataRepository } from "../InMemoryBibleDataRepository";

describe("InMemoryBibleDataRepository", () => {
  let repository: InMemoryBibleDataRepository;

  beforeEach(() => {
    repository = new InMemoryBibleDataRepository();
  });

  it("should return null for unseeded keys", () => {
    expect(repository.findVerse("Jude.1.1")).toBeNull();
    expect(repository.findDefinition("G2455")).toBeNull();
  });

  it("should return seeded entries as stored", () => {
    const verse = { tokens: [] };
    repository.addVerse("Jude.1.1", verse);
    repository.addDefinition("G2455", "Judas, Jude");

    expect(repository.findVerse("Jude.1.1")).toBe(verse);
    expect(repository.findDefinition("G2455")).toBe("Judas, Jude");
  });

  it("should forget everything on clear", () => {
    repository.addVerse("Jude.1.1", { tokens: [] });
    repository.setInitialized(false);

    repository.clear();

    expect(repository.findVerse("Jude.1.1")).toBeNull();
    expect(repository.getStatus()).toEqual({
      initialized: true,
      versesCount: 0,
      lexiconCount: 0,
    });
  });
});
