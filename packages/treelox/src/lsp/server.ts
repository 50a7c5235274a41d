import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  type InitializeResult,
  type CompletionItem,
  TextDocumentSyncKind,
} from 'vscode-languageserver/node';

import { TextDocument } from 'vscode-languageserver-textdocument';
import { collectDiagnostics, hoverAt, keywordCompletions } from './features';

// Create a connection for the server, using Node's IPC or stdio as a transport.
const connection = createConnection(ProposedFeatures.all);

const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

connection.onInitialize(() => {
  const result: InitializeResult = {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      completionProvider: {
        resolveProvider: false
      },
      hoverProvider: true
    }
  };
  return result;
});

// Emitted when a text document is first opened and whenever its content changes.
documents.onDidChangeContent(change => {
  validateTextDocument(change.document);
});

function validateTextDocument(textDocument: TextDocument) {
  const diagnostics = collectDiagnostics(textDocument.getText());
  connection.sendDiagnostics({ uri: textDocument.uri, diagnostics })
    .catch((e: unknown) => connection.console.error(`failed to publish diagnostics: ${String(e)}`));
}

connection.onCompletion((): CompletionItem[] => keywordCompletions());

connection.onHover((params) => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return null;
  return hoverAt(doc.getText(), params.position.line, params.position.character);
});

// Make the text document manager listen on the connection
// for open, change and close text document events
documents.listen(connection);

connection.listen();
