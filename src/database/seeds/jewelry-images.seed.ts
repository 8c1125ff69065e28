import { Repository } from 'typeorm';
import { JewelryImage } from '../../prediction/entities/jewelry-image.entity';

export interface JewelryImageSeed {
  name: string;
  url: string;
}

/**
 * Accepts `[{ name, url }, ...]`. Later entries win when a name repeats.
 */
export function parseJewelryImages(value: unknown): JewelryImageSeed[] {
  if (!Array.isArray(value)) {
    throw new Error('Jewelry image seed must be an array of { name, url }');
  }

  const byName = new Map<string, JewelryImageSeed>();
  value.forEach((entry: unknown, index) => {
    if (typeof entry !== 'object' || entry === null) {
      throw new Error(`Entry ${index} is not an object`);
    }
    const name: unknown = Reflect.get(entry, 'name');
    const url: unknown = Reflect.get(entry, 'url');
    if (typeof name !== 'string' || name.trim() === '') {
      throw new Error(`Entry ${index} has no name`);
    }
    if (typeof url !== 'string' || url.trim() === '') {
      throw new Error(`Entry ${index} (${name}) has no url`);
    }
    byName.set(name.trim(), { name: name.trim(), url: url.trim() });
  });
  return [...byName.values()];
}

/**
 * Inserts new names and updates the URL of existing ones.
 */
export async function seedJewelryImages(
  repository: Repository<JewelryImage>,
  images: JewelryImageSeed[],
): Promise<number> {
  if (images.length === 0) {
    return 0;
  }
  await repository.upsert(images, ['name']);
  return images.length;
}
