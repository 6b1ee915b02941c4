import {
    createConnection,
    TextDocuments,
    ProposedFeatures,
    InitializeParams,
    InitializeResult,
    TextDocumentSyncKind,
    CompletionList,
    TextDocumentPositionParams,
    Range,
    TextEdit,
} from 'vscode-languageserver/node';

import { TextDocument } from 'vscode-languageserver-textdocument';
import { alignSyntaxTest, getAssertedRegion, querySyntaxTestContext, suggestSyntaxTest } from '../parser';
import { SyntaxDevEngine } from './engine';
import { toError } from './errors';
import { createLeveledLogger } from './logger';
import {
    ALIGN_SYNTAX_TEST_REQUEST,
    ASSERTED_REGION_REQUEST,
    COMPLETION_TRIGGER_CHARACTERS,
    PACKAGE_CHANGED_NOTIFICATION,
    QUERY_CONTEXT_REQUEST,
    SUGGEST_SYNTAX_TEST_REQUEST,
    dialectOf,
    fileNameOf,
    parseAssertedRegionParams,
    parseDocumentPosition,
    parsePackageChangeEvent,
    parseQueryContextParams,
    parseSuggestSyntaxTestParams,
    toCompletionList,
    toDiagnostic,
} from './protocol';
import { resolveSettings, settingsSection } from './settings';
import { Logger } from './types';

// Create a connection for the server using Node's IPC
const connection = createConnection(ProposedFeatures.all);

// Messages go through the level filter in force when they are logged
let logger: Logger = createLeveledLogger(connection.console, 'info');
const engineLogger: Logger = {
    error: message => logger.error(message),
    warn: message => logger.warn(message),
    info: message => logger.info(message),
    log: message => logger.log(message),
};

const engine = new SyntaxDevEngine(engineLogger);

// Create a text document manager
const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

function applySettings(value: unknown): void {
    const settings = resolveSettings(value, engine.getSettings());
    engine.updateSettings(settings);
    logger = createLeveledLogger(connection.console, settings.logLevel);
}

function validate(document: TextDocument): void {
    const dialect = dialectOf(document.languageId, document.uri, document.getText());
    if (!dialect) return;
    const diagnostics = engine.getDiagnostics(document.getText(), dialect).map(f => toDiagnostic(f, document));
    connection.sendDiagnostics({ uri: document.uri, diagnostics });
}

async function loadPackages(): Promise<void> {
    try {
        await engine.loadPackages();
        documents.all().forEach(validate);
    } catch (error) {
        logger.error(`Package loading failed: ${toError(error).message}`);
    }
}

async function applyPackageChange(params: unknown): Promise<void> {
    const event = parsePackageChangeEvent(params);
    if (!event) {
        logger.warn(`Ignoring malformed ${PACKAGE_CHANGED_NOTIFICATION} notification`);
        return;
    }
    try {
        await engine.onPackageChanged(event);
        documents.all().forEach(validate);
    } catch (error) {
        logger.error(`Package change failed: ${toError(error).message}`);
    }
}

connection.onInitialize((params: InitializeParams): InitializeResult => {
    applySettings(params.initializationOptions);
    logger.info('Server initializing...');

    return {
        capabilities: {
            textDocumentSync: TextDocumentSyncKind.Incremental,
            completionProvider: {
                resolveProvider: false,
                triggerCharacters: COMPLETION_TRIGGER_CHARACTERS,
            },
        },
    };
});

connection.onInitialized(() => {
    void loadPackages();
});

connection.onDidChangeConfiguration(change => {
    const previousPaths = engine.getSettings().packagesPaths.join('\n');
    applySettings(settingsSection(change));
    if (engine.getSettings().packagesPaths.join('\n') !== previousPaths) {
        void loadPackages();
    }
    documents.all().forEach(validate);
});

// Validate document and publish diagnostics
documents.onDidChangeContent(change => {
    validate(change.document);
});

documents.onDidClose(e => {
    connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] });
});

// Completion handler
connection.onCompletion((params: TextDocumentPositionParams): CompletionList | null => {
    const document = documents.get(params.textDocument.uri);
    if (!document) return null;
    const dialect = dialectOf(document.languageId, document.uri, document.getText());
    if (!dialect) return null;

    const offset = document.offsetAt(params.position);
    return toCompletionList(engine.getCompletions(document.getText(), offset, dialect), document);
});

connection.onNotification(PACKAGE_CHANGED_NOTIFICATION, (params: unknown) => {
    void applyPackageChange(params);
});

connection.onRequest(ALIGN_SYNTAX_TEST_REQUEST, (params: unknown): TextEdit | null => {
    const request = parseDocumentPosition(params);
    const document = request ? documents.get(request.uri) : undefined;
    if (!request || !document) return null;

    const insertion = alignSyntaxTest(document.getText(), document.offsetAt(request.position), fileNameOf(document.uri));
    if (!insertion) return null;
    return TextEdit.insert(document.positionAt(insertion.offset), insertion.text);
});

connection.onRequest(QUERY_CONTEXT_REQUEST, (params: unknown): boolean | null => {
    const request = parseQueryContextParams(params);
    const document = request ? documents.get(request.uri) : undefined;
    if (!request || !document) return null;

    return querySyntaxTestContext(
        document.getText(),
        document.offsetAt(request.position),
        request.key,
        request.operator,
        request.operand,
        fileNameOf(document.uri)
    );
});

connection.onRequest(ASSERTED_REGION_REQUEST, (params: unknown): Range | null => {
    const request = parseAssertedRegionParams(params);
    const document = request ? documents.get(request.uri) : undefined;
    if (!request || !document) return null;

    const region = getAssertedRegion(
        document.getText(),
        { start: document.offsetAt(request.range.start), end: document.offsetAt(request.range.end) },
        fileNameOf(document.uri)
    );
    return region ? Range.create(document.positionAt(region.start), document.positionAt(region.end)) : null;
});

connection.onRequest(SUGGEST_SYNTAX_TEST_REQUEST, (params: unknown): { edit: TextEdit; selection: Range } | null => {
    const request = parseSuggestSyntaxTestParams(params);
    const document = request ? documents.get(request.uri) : undefined;
    if (!request || !document) return null;

    const suggestion = suggestSyntaxTest(
        document.getText(),
        { start: document.offsetAt(request.range.start), end: document.offsetAt(request.range.end) },
        request.scopes,
        request.baseScope,
        fileNameOf(document.uri),
        request.character
    );
    if (!suggestion) return null;

    const { edit, selection } = suggestion;
    const replaced = Range.create(document.positionAt(edit.start), document.positionAt(edit.end));
    // The selection is in the edited text; the edit sits on one line
    const line = replaced.start.line;
    const lineStart = edit.start - replaced.start.character;
    return {
        edit: TextEdit.replace(replaced, edit.text),
        selection: Range.create(line, selection.start - lineStart, line, selection.end - lineStart),
    };
});

// Make the text document manager listen on the connection
documents.listen(connection);

// Listen on the connection
connection.listen();
