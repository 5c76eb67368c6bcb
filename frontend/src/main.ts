import { createApi } from "./api";
import { TranscriptApp, findElements } from "./app";

document.addEventListener("DOMContentLoaded", () => {
  const app = new TranscriptApp(findElements(document), createApi());
  app.mount();
});
