import { promises as fs } from "fs";
import path from "path";
import type { Card } from "@shared/index";
import { renderCardFields } from "./card";

export const EXPORT_SEPARATOR = ";";

// The text format has no tip field, so the tip trails the back side.
export function renderExportLine(card: Card): string {
  const { front, back, tip } = renderCardFields(card);
  const backWithTip = tip ? `${back}<br><br>💡 <i>${tip}</i>` : back;
  return `${front}${EXPORT_SEPARATOR}${backWithTip}`;
}

export function renderExport(cards: readonly Card[]): string {
  return cards.map((card) => `${renderExportLine(card)}\n`).join("");
}

export async function writeExportFile(cards: readonly Card[], filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, renderExport(cards), "utf8");
  console.log(`[export] wrote ${cards.length} cards to ${filePath}`);
}
