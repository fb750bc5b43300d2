import { parseServerConfig } from 'src/shared/config/env';
import { MaskDocumentUseCase } from 'src/shared/backend/use-cases/mask-document.use-case';
import { AnalyzeDocumentUseCase } from 'src/shared/backend/use-cases/analyze-document.use-case';
import { Container } from '../container';
import { createBackendContainer } from '../module';
import { ANALYZE_DOCUMENT_USE_CASE, MASK_DOCUMENT_USE_CASE, PII_DETECTION_SERVICE } from '../tokens';

describe('Container', () => {
    const TOKEN = Symbol('TOKEN');

    it('creates a provider once and caches it', () => {
        const factory = jest.fn(() => ({ id: 1 }));
        const container = new Container().register(TOKEN, factory);

        const first = container.resolve<{ id: number }>(TOKEN);
        const second = container.resolve<{ id: number }>(TOKEN);

        expect(first).toBe(second);
        expect(factory).toHaveBeenCalledTimes(1);
    });

    it('passes itself to factories', () => {
        const DEP = Symbol('DEP');
        const container = new Container()
            .registerInstance(DEP, 'dependency')
            .register(TOKEN, (c) => `uses ${c.resolve<string>(DEP)}`);

        expect(container.resolve<string>(TOKEN)).toBe('uses dependency');
    });

    it('replaces a cached instance when re-registered', () => {
        const container = new Container().register(TOKEN, () => 'first');
        container.resolve<string>(TOKEN);
        container.register(TOKEN, () => 'second');

        expect(container.resolve<string>(TOKEN)).toBe('second');
    });

    it('throws for unknown tokens', () => {
        expect(() => new Container().resolve(TOKEN)).toThrow('No provider registered for token: Symbol(TOKEN)');
    });
});

describe('createBackendContainer', () => {
    it('wires the use-cases around one detection service', () => {
        const container = createBackendContainer(parseServerConfig({ NODE_ENV: 'test' }));

        expect(container.has(PII_DETECTION_SERVICE)).toBe(true);
        expect(container.resolve(MASK_DOCUMENT_USE_CASE)).toBeInstanceOf(MaskDocumentUseCase);
        expect(container.resolve(ANALYZE_DOCUMENT_USE_CASE)).toBeInstanceOf(AnalyzeDocumentUseCase);
    });
});
