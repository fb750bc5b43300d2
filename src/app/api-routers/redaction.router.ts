import { z } from 'zod';
import { createTRPCRouter, publicProcedure } from 'src/app/api-routers/init';
import { ANALYZE_DOCUMENT_USE_CASE, MASK_DOCUMENT_USE_CASE } from 'src/shared/backend/container';
import { PII_CATEGORIES } from 'src/shared/backend/pii-detection';
import type { AnalyzeDocumentUseCase } from 'src/shared/backend/use-cases/analyze-document.use-case';
import type { MaskDocumentResult, MaskDocumentUseCase } from 'src/shared/backend/use-cases/mask-document.use-case';
import { readUploadForm } from './upload-form';

const categoriesSchema = z.array(z.enum(PII_CATEGORIES)).min(1).optional();

const textInputSchema = z.object({
    text: z.string().min(1, 'Text cannot be empty'),
    categories: categoriesSchema,
});

/** Buffers go out as base64 so the browser can offer the masked file for download. */
function toMaskResponse(result: MaskDocumentResult) {
    const { file, ...rest } = result;
    return {
        ...rest,
        file: file
            ? {
                  filename: file.filename,
                  contentType: file.contentType,
                  sizeBytes: file.content.length,
                  base64: file.content.toString('base64'),
              }
            : null,
    };
}

export const redactionRouter = createTRPCRouter({
    /**
     * Review step for an uploaded document: extracted text plus every distinct detected value
     */
    analyzeFile: publicProcedure.input(z.instanceof(FormData)).mutation(async ({ ctx, input }) => {
        const form = await readUploadForm(input);
        return ctx.container
            .resolve<AnalyzeDocumentUseCase>(ANALYZE_DOCUMENT_USE_CASE)
            .execute({ source: form.source, categories: form.categories });
    }),

    /**
     * Mask an uploaded document and return the masked text and a downloadable copy
     */
    maskFile: publicProcedure.input(z.instanceof(FormData)).mutation(async ({ ctx, input }) => {
        const form = await readUploadForm(input);
        const result = await ctx.container.resolve<MaskDocumentUseCase>(MASK_DOCUMENT_USE_CASE).execute({
            source: form.source,
            categories: form.categories,
            ignoredValues: form.ignoredValues,
        });
        return toMaskResponse(result);
    }),

    /**
     * Review step for pasted text
     */
    analyzeText: publicProcedure.input(textInputSchema).mutation(async ({ ctx, input }) => {
        return ctx.container
            .resolve<AnalyzeDocumentUseCase>(ANALYZE_DOCUMENT_USE_CASE)
            .execute({ source: { kind: 'text', text: input.text }, categories: input.categories });
    }),

    /**
     * Mask pasted text; no file is produced
     */
    maskText: publicProcedure
        .input(
            textInputSchema.extend({
                ignoredValues: z.array(z.string()).optional(),
            }),
        )
        .mutation(async ({ ctx, input }) => {
            const result = await ctx.container.resolve<MaskDocumentUseCase>(MASK_DOCUMENT_USE_CASE).execute({
                source: { kind: 'text', text: input.text },
                categories: input.categories,
                ignoredValues: input.ignoredValues,
            });
            return toMaskResponse(result);
        }),
});
