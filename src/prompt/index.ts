/**
 * Prompt composition: template loading, rendering and the Stage 2 composer.
 */

export {
    createLoader,
    render,
    formatValue,
    type LoadedTemplate,
    type LoaderInstance,
    type LoaderConfig,
} from './template';
export { create as createComposer, type ComposerInstance, type ComposerConfig } from './composer';
