import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { JewelryImage } from '../entities/jewelry-image.entity';

@Injectable()
export class JewelryImageService {
  constructor(
    @InjectRepository(JewelryImage)
    private jewelryImageRepository: Repository<JewelryImage>,
  ) {}

  /**
   * Image URL per jewelry name. Names without an image are absent from the map.
   */
  async resolveUrls(names: Iterable<string>): Promise<Map<string, string>> {
    const unique = [...new Set(names)];
    if (unique.length === 0) {
      return new Map();
    }
    const images = await this.jewelryImageRepository.find({ where: { name: In(unique) } });
    return new Map(images.map((image) => [image.name, image.url]));
  }
}
