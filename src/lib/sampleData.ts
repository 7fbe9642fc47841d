import type { VinylRecord } from './types';

export const SAMPLE_CATALOG: VinylRecord[] = [
  {
    name: 'Abbey Road',
    artist: 'The Beatles',
    year: '1969',
    description: 'Gravadora: Apple Records\n\nPrincipais faixas:\n• Come Together\n• Something',
    condition: 'Capa com leve desgaste, disco sem riscos',
    price: 180,
    salesPost: '🎵 Abbey Road - The Beatles\n\n📩 Interessado? Chama no direct!\n\n#vinil #beatles',
    status: 'pendente',
    frontImageUrl: 'https://drive.google.com/file/d/front-abbey/view',
    backImageUrl: 'https://drive.google.com/file/d/back-abbey/view'
  },
  {
    name: 'Clube da Esquina',
    artist: 'Milton Nascimento',
    year: '1972',
    condition: 'Muito bom',
    price: 249.9,
    salesPost: '🎵 Clube da Esquina - Milton Nascimento\n\n#vinil #mpb',
    status: 'publicado',
    publishedAt: new Date(2025, 2, 14, 9, 5),
    frontImageUrl: 'https://drive.google.com/file/d/front-clube/view'
  },
  {
    name: 'Acabou Chorare',
    artist: 'Novos Baianos',
    status: 'pendente'
  }
];
