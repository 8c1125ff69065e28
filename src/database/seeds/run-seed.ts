import 'reflect-metadata';
import { readFileSync } from 'fs';
import dataSource from '../../config/typeorm.config';
import { JewelryImage } from '../../prediction/entities/jewelry-image.entity';
import { parseJewelryImages, seedJewelryImages } from './jewelry-images.seed';

async function seed() {
  const file = process.argv[2];
  if (!file) {
    console.error('Usage: npm run seed:jewelry-images -- <file.json>');
    process.exit(1);
  }

  try {
    console.log(`🌱 Seeding jewelry images from ${file}...`);
    const images = parseJewelryImages(JSON.parse(readFileSync(file, 'utf8')));

    await dataSource.initialize();
    console.log('✅ Database connected');

    const count = await seedJewelryImages(dataSource.getRepository(JewelryImage), images);
    console.log(`✅ Upserted ${count} jewelry images`);

    await dataSource.destroy();
  } catch (error) {
    console.error('❌ Seed failed:', error);
    process.exit(1);
  }
}

void seed();
