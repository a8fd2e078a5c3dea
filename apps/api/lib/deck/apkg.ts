import { createHash } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import Database from "better-sqlite3";
import JSZip from "jszip";
import type { Card } from "@shared/index";
import { renderCardFields, type CardFields } from "../card";
import { describeError, PackagingError } from "../errors";
import defaults from "./collection-defaults.json";
import {
  CARD_TEMPLATES,
  DECK_ID,
  NOTE_FIELDS,
  NOTE_TYPE_CSS,
  NOTE_TYPE_ID,
  NOTE_TYPE_NAME,
  TEMPLATE_REQUIREMENTS
} from "./note-type";

const FIELD_SEPARATOR = "\x1f";
const SCHEMA_VERSION = 11;

const SCHEMA = `
CREATE TABLE col (
  id integer primary key, crt integer not null, mod integer not null, scm integer not null,
  ver integer not null, dty integer not null, usn integer not null, ls integer not null,
  conf text not null, models text not null, decks text not null, dconf text not null, tags text not null
);
CREATE TABLE notes (
  id integer primary key, guid text not null, mid integer not null, mod integer not null,
  usn integer not null, tags text not null, flds text not null, sfld integer not null,
  csum integer not null, flags integer not null, data text not null
);
CREATE TABLE cards (
  id integer primary key, nid integer not null, did integer not null, ord integer not null,
  mod integer not null, usn integer not null, type integer not null, queue integer not null,
  due integer not null, ivl integer not null, factor integer not null, reps integer not null,
  lapses integer not null, left integer not null, odue integer not null, odid integer not null,
  flags integer not null, data text not null
);
CREATE TABLE revlog (
  id integer primary key, cid integer not null, usn integer not null, time integer not null,
  ivl integer not null, factor integer not null, ease integer not null, lastIvl integer not null,
  type integer not null
);
CREATE TABLE graves (usn integer not null, oid integer not null, type integer not null);
CREATE INDEX ix_notes_usn on notes (usn);
CREATE INDEX ix_cards_usn on cards (usn);
CREATE INDEX ix_revlog_usn on revlog (usn);
CREATE INDEX ix_cards_nid on cards (nid);
CREATE INDEX ix_cards_sched on cards (did, queue, due);
CREATE INDEX ix_revlog_cid on revlog (cid);
CREATE INDEX ix_notes_csum on notes (csum);
`;

export type DeckPackageOptions = {
  deckName: string;
  audioDir: string;
  /** Epoch milliseconds used for ids and timestamps. */
  now?: number;
};

export type DeckPackage = {
  bytes: Buffer;
  noteCount: number;
  cardCount: number;
  mediaFiles: string[];
};

type MediaFile = {
  name: string;
  data: Buffer;
};

function sortFieldOf(front: string): string {
  return front
    .replace(/\[sound:[^\]]*\]/g, "")
    .replace(/<br\s*\/?>/gi, " ")
    .replace(/<[^>]*>/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

function checksumOf(sortField: string): number {
  return parseInt(createHash("sha1").update(sortField).digest("hex").slice(0, 8), 16);
}

function guidOf(fields: CardFields): string {
  return createHash("sha256").update(`${fields.front}${FIELD_SEPARATOR}${fields.back}`).digest("base64").slice(0, 10);
}

// The reverse template only renders when IsWord is set, so only word notes get a second card.
export function templateOrdinalsFor(fields: CardFields): number[] {
  return fields.isWord ? [0, 1] : [0];
}

function buildNoteType(modSeconds: number) {
  return {
    id: NOTE_TYPE_ID,
    name: NOTE_TYPE_NAME,
    type: 0,
    mod: modSeconds,
    usn: -1,
    sortf: 0,
    did: DECK_ID,
    tmpls: CARD_TEMPLATES.map((template, ord) => ({
      name: template.name,
      ord,
      qfmt: template.qfmt,
      afmt: template.afmt,
      did: null,
      bqfmt: "",
      bafmt: ""
    })),
    flds: NOTE_FIELDS.map((name, ord) => ({ name, ord, sticky: false, rtl: false, font: "Arial", size: 20, media: [] })),
    css: NOTE_TYPE_CSS,
    latexPre: defaults.latexPre,
    latexPost: defaults.latexPost,
    req: TEMPLATE_REQUIREMENTS,
    tags: [],
    vers: []
  };
}

function buildCollection(fieldsList: CardFields[], deckName: string, now: number): { collection: Buffer; cardCount: number } {
  const db = new Database(":memory:");
  try {
    db.exec(SCHEMA);
    const modSeconds = Math.floor(now / 1000);
    const decks = {
      "1": { ...defaults.deck, id: 1, name: "Default", mod: modSeconds },
      [String(DECK_ID)]: { ...defaults.deck, id: DECK_ID, name: deckName, mod: modSeconds }
    };

    db.prepare("INSERT INTO col VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)").run(
      1,
      modSeconds,
      now,
      now,
      SCHEMA_VERSION,
      0,
      0,
      0,
      JSON.stringify(defaults.conf),
      JSON.stringify({ [String(NOTE_TYPE_ID)]: buildNoteType(modSeconds) }),
      JSON.stringify(decks),
      JSON.stringify(defaults.dconf),
      "{}"
    );

    const insertNote = db.prepare("INSERT INTO notes VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)");
    const insertCard = db.prepare("INSERT INTO cards VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)");
    let cardCount = 0;

    db.transaction(() => {
      fieldsList.forEach((fields, index) => {
        const noteId = now + index;
        const sortField = sortFieldOf(fields.front);
        const flds = [fields.front, fields.back, fields.tip, fields.isWord].join(FIELD_SEPARATOR);
        insertNote.run(noteId, guidOf(fields), NOTE_TYPE_ID, modSeconds, -1, "", flds, sortField, checksumOf(sortField), 0, "");
        for (const ord of templateOrdinalsFor(fields)) {
          insertCard.run(now + cardCount, noteId, DECK_ID, ord, modSeconds, -1, 0, 0, index + 1, 0, 0, 0, 0, 0, 0, 0, 0, "");
          cardCount += 1;
        }
      });
    })();

    return { collection: db.serialize(), cardCount };
  } finally {
    db.close();
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function collectMedia(cards: readonly Card[], audioDir: string): Promise<MediaFile[]> {
  const names = [...new Set(cards.flatMap((card) => (card.audioFileName ? [card.audioFileName] : [])))];
  const media: MediaFile[] = [];
  for (const name of names) {
    try {
      media.push({ name, data: await fs.readFile(path.join(audioDir, name)) });
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      console.warn(`[deck] audio file ${name} is missing; the card keeps its sound tag without media`);
    }
  }
  return media;
}

/**
 * Builds an importable `.apkg`: a zip holding the SQLite collection, a `media`
 * index mapping numbered entries to file names, and the audio files themselves.
 */
export async function buildDeckPackage(cards: readonly Card[], options: DeckPackageOptions): Promise<DeckPackage> {
  const now = options.now ?? Date.now();
  const fieldsList = cards.map(renderCardFields);
  const { collection, cardCount } = buildCollection(fieldsList, options.deckName, now);
  const media = await collectMedia(cards, options.audioDir);

  const zip = new JSZip();
  zip.file("collection.anki2", collection);
  const mediaIndex: Record<string, string> = {};
  media.forEach((file, index) => {
    mediaIndex[String(index)] = file.name;
    zip.file(String(index), file.data);
  });
  zip.file("media", JSON.stringify(mediaIndex));

  const bytes = await zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
  return { bytes, noteCount: fieldsList.length, cardCount, mediaFiles: media.map((file) => file.name) };
}

export async function writeDeckPackage(cards: readonly Card[], filePath: string, options: DeckPackageOptions): Promise<DeckPackage> {
  try {
    const deck = await buildDeckPackage(cards, options);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, deck.bytes);
    console.log(`[deck] wrote ${deck.noteCount} notes, ${deck.cardCount} cards and ${deck.mediaFiles.length} media files to ${filePath}`);
    return deck;
  } catch (error) {
    throw new PackagingError(`Could not write the deck package: ${describeError(error)}`, { cause: error });
  }
}
