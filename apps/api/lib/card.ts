import type { Card } from "@shared/index";
import type { AudioResult } from "./audio";
import type { EnrichedContent } from "./enricher";
import { audioFileNameFor } from "./text";

export type CardFields = {
  front: string;
  back: string;
  tip: string;
  isWord: string;
};

export function assembleCard(id: number, sourceText: string, content: EnrichedContent, audio: AudioResult): Card {
  const isWord = content.kind === "word";
  const card: Card = {
    id,
    kind: content.kind,
    sourceText,
    translations: Object.freeze([...content.translations]),
    ...(content.context ? { context: Object.freeze({ ...content.context }) } : {}),
    ...(isWord && content.gender ? { gender: content.gender } : {}),
    ...(isWord && content.plural ? { plural: content.plural } : {}),
    ...(content.tip ? { tip: content.tip } : {}),
    ...(audio.succeeded ? { audioFileName: audioFileNameFor(audio.sourceTextUsed) } : {})
  };
  return Object.freeze(card);
}

const emphasis = (text: string) => `<i>${text}</i>`;

/**
 * Field contents shared by the text export and the deck package. Both writers
 * go through here so the two outputs cannot drift apart.
 */
export function renderCardFields(card: Card): CardFields {
  const sound = card.audioFileName ? `[sound:${card.audioFileName}]` : "";
  // Typed input may carry the export separator; model output is already cleaned of it.
  const source = card.sourceText.replace(/;/g, ",");
  const front: string[] = [];
  const back: string[] = [card.translations.join(", ")];

  if (card.kind === "word") {
    front.push(
      [sound, card.gender ? `(${card.gender})` : "", source, card.plural ? `(pl: ${card.plural})` : ""]
        .filter(Boolean)
        .join(" ")
    );
  } else {
    if (sound) front.push(sound);
    front.push(source);
  }

  if (card.kind !== "sentence" && card.context) {
    front.push(emphasis(card.context.source));
    if (card.context.target) back.push(emphasis(card.context.target));
  }

  return {
    front: front.join("<br>"),
    back: back.join("<br>"),
    tip: card.tip ?? "",
    isWord: card.kind === "word" ? "1" : ""
  };
}
