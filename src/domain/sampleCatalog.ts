import { Product } from './models.js';

export const SAMPLE_CATALOG: readonly Product[] = [
  { type: 'physical', productId: '001A', name: 'Tata Salt 1kg', price: 28.0, quantityAvailable: 100, weight: 1.0 },
  { type: 'physical', productId: '002A', name: 'Amul Butter 100g', price: 50.0, quantityAvailable: 50, weight: 0.1 },
  { type: 'physical', productId: '003A', name: 'Parle-G Biscuits 100g', price: 10.0, quantityAvailable: 200, weight: 0.1 },
  { type: 'physical', productId: '004A', name: 'Maggi Noodles 70g', price: 12.0, quantityAvailable: 150, weight: 0.07 },
  { type: 'physical', productId: '005A', name: 'Dettol Soap 75g', price: 35.0, quantityAvailable: 80, weight: 0.075 },
  {
    type: 'digital',
    productId: '006A',
    name: 'Bollywood Movie - Sholay',
    price: 99.0,
    quantityAvailable: 1000,
    downloadLink: 'https://store.example.com/download/sholay',
  },
  {
    type: 'digital',
    productId: '007A',
    name: 'Hindi Learning Course',
    price: 799.0,
    quantityAvailable: 500,
    downloadLink: 'https://courses.example.com/hindi-basic',
  },
  {
    type: 'digital',
    productId: '008A',
    name: 'Indian Classical Music Collection',
    price: 249.0,
    quantityAvailable: 300,
    downloadLink: 'https://music.example.com/classical-indian',
  },
  {
    type: 'digital',
    productId: '009A',
    name: 'Yoga for Beginners',
    price: 499.0,
    quantityAvailable: 200,
    downloadLink: 'https://fitness.example.com/yoga-course',
  },
];
