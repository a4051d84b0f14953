import {
  createConnection,
  type DocumentSymbolParams,
  type HoverParams,
  type InitializeParams,
  type InitializeResult,
  ProposedFeatures,
  TextDocuments,
  TextDocumentSyncKind,
} from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import { NAME, VERSION } from "../version.js";
import { computeDiagnostics, documentSymbols, hover } from "./features.js";

const connection = createConnection(ProposedFeatures.all);

const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

connection.onInitialize((params: InitializeParams): InitializeResult => {
  connection.console.log(
    `${NAME} ${VERSION} language server starting for ${params.clientInfo?.name ?? "unknown client"}`
  );
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Full,
      hoverProvider: true,
      documentSymbolProvider: true,
    },
  };
});

connection.onInitialized(() => {
  connection.console.log("NoteG language server initialized");
});

function validateTextDocument(document: TextDocument) {
  try {
    const diagnostics = computeDiagnostics(document);
    void connection.sendDiagnostics({ uri: document.uri, diagnostics });
  } catch (e) {
    connection.console.error(`Failed to check ${document.uri}: ${e}`);
  }
}

documents.onDidChangeContent((change) => {
  validateTextDocument(change.document);
});

// When a document is closed, clear its diagnostics
documents.onDidClose((event) => {
  void connection.sendDiagnostics({ uri: event.document.uri, diagnostics: [] });
});

connection.onDocumentSymbol((params: DocumentSymbolParams) => {
  const document = documents.get(params.textDocument.uri);
  return document ? documentSymbols(document) : [];
});

connection.onHover((params: HoverParams) => {
  const document = documents.get(params.textDocument.uri);
  return document ? hover(document, params.position) : null;
});

documents.listen(connection);

connection.listen();
