import { DirectoryLoader } from "@langchain/classic/document_loaders/fs/directory";
import { TextLoader } from "@langchain/classic/document_loaders/fs/text";

export type SourceDocument = {
  source: string;
  text: string;
};

export async function loadSourceDirectory(sourceDir: string): Promise<SourceDocument[]> {
  const loader = new DirectoryLoader(
    sourceDir,
    {
      ".txt": (p: string) => new TextLoader(p),
      ".md": (p: string) => new TextLoader(p)
    },
    true,
    "ignore"
  );

  const docs = await loader.load();
  return docs.map((d) => ({
    source: String(d.metadata.source ?? ""),
    text: d.pageContent
  }));
}
