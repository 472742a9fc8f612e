import { Chunk } from "../../../src/types";

export function chunk(hash: string, pageNo: number, year: number | null, text: string): Chunk {
  return { hash, pageNo, year, url: `https://comune.example.it/docs/${hash}.pdf`, filename: `${hash}.pdf`, text };
}

export const CORPUS: Chunk[] = [
  chunk("h1", 1, 2022, "spesa corrente bilancio"),
  chunk("h2", 1, 2021, "spesa personale"),
  chunk("h3", 2, null, "raccolta rifiuti ambiente"),
  chunk("h4", 1, 2022, "verbale consiglio comunale"),
  chunk("h5", 1, 2022, "delibera giunta"),
  chunk("h6", 1, 2021, "albo pretorio"),
];
