export { convertEpub, convertEpubBuffer, EPUB_MIME_TYPE } from "./epubConverter";
export type { ConvertedPackage } from "./epubConverter";

export * from "./types";
export * from "./errors";
export * from "./options";
export * from "./emboldener";
export * from "./markupTokenizer";
export * from "./documentWalker";
export * from "./packageDiscovery";
