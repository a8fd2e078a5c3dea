export const NOTE_TYPE_ID = 1634523456;
export const DECK_ID = 2654323456;

export const NOTE_TYPE_NAME = "German Vocabulary (Reversible)";

export const NOTE_FIELDS = ["Question", "Answer", "Tip", "IsWord"] as const;

const TIP_BLOCK = "{{#Tip}}💡 <i>{{Tip}}</i>{{/Tip}}";

export type CardTemplate = {
  name: string;
  qfmt: string;
  afmt: string;
};

export const CARD_TEMPLATES: readonly CardTemplate[] = [
  {
    name: "German -> English",
    qfmt: "{{Question}}",
    afmt: `{{FrontSide}}<hr id="answer">{{Answer}}<br><br>${TIP_BLOCK}`
  },
  {
    name: "English -> German (Reversed)",
    qfmt: '{{#IsWord}}{{Answer}}<br><br><small style="color:gray">(What is this in German?)</small>{{/IsWord}}',
    afmt: `{{FrontSide}}<hr id="answer">{{Question}}<br><br>${TIP_BLOCK}`
  }
];

// Field ordinals each template needs before Anki generates a card from it.
export const TEMPLATE_REQUIREMENTS: ReadonlyArray<[number, "all" | "any", number[]]> = [
  [0, "all", [0]],
  [1, "all", [1, 3]]
];

export const NOTE_TYPE_CSS = `.card {
 font-family: arial;
 font-size: 20px;
 text-align: center;
 color: black;
 background-color: white;
}`;
