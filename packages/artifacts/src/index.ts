export * from "./dispatch.js";
export * from "./escape.js";
export * from "./images.js";
export * from "./slideParts.js";
export * from "./templates.js";
export * from "./markdown/deckMarkup.js";
export * from "./markdown/markupTools.js";
export * from "./pptx/deckPptx.js";
export * from "./html/revealDeck.js";
export * from "./render.js";
