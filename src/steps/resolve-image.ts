import { AmbiguousImageError, NoMatchingImageError, ValidationError } from '../errors';
import { BuildState } from '../orchestration/state';
import { BuildStep, StepAction, StepContext } from '../orchestration/types';
import { ImageRecord } from '../provisioning/types';
import { StepDependencies } from './types';

export function mostRecent(images: ImageRecord[]): ImageRecord | undefined {
  return [...images].sort((a, b) => Date.parse(b.created) - Date.parse(a.created))[0];
}

export class ResolveImageStep implements BuildStep {
  readonly name = 'resolve-image';
  readonly reads = [] as const;
  readonly writes = ['image'] as const;

  constructor(private readonly deps: StepDependencies) {}

  async run(state: BuildState, { logger }: StepContext): Promise<StepAction> {
    const { config, client } = this.deps;

    if (config.image) {
      state.set('image', { ref: config.image });
      return 'continue';
    }

    const filter = config.image_filter;
    if (!filter || filter.with_selector.length === 0) {
      throw new ValidationError(['image or image_filter is required']);
    }

    const selector = filter.with_selector.join(',');
    const { architecture } = await client.getServerType(config.server_type);
    const images = await client.listImages({ labelSelector: selector, architecture });

    const chosen = mostRecent(images);
    if (!chosen) {
      throw new NoMatchingImageError(selector);
    }
    if (images.length > 1 && !filter.most_recent) {
      throw new AmbiguousImageError(selector, images.length);
    }

    logger.info(`Using image ${chosen.id} (${chosen.name ?? chosen.description}) for selector "${selector}"`);
    state.set('image', { ref: String(chosen.id), id: chosen.id });
    return 'continue';
  }

  async cleanup(): Promise<void> {
    // read-only step
  }
}
