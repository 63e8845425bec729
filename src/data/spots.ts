export interface Spot {
  title: string;
  description: string;
  imageUrl: string;
  mapUrl: string;
}

export const POPULAR_SPOTS: readonly Spot[] = [
  {
    title: '성산일출봉',
    description: '제주의 상징적 일출 명소이자 유네스코 세계자연유산.',
    imageUrl: 'https://api.cdn.visitjeju.net/photomng/imgpath/202009/10/2020091009043672295d3c-9b69-4a9b-a0ec-2d24f8e2df4c.jpg',
    mapUrl: 'https://map.kakao.com/?q=%EC%84%B1%EC%82%B0%EC%9D%BC%EC%B6%9C%EB%B4%89',
  },
  {
    title: '협재해변',
    description: '에메랄드빛 바다와 하얀 모래로 유명한 서제주 대표 해변.',
    imageUrl: 'https://api.cdn.visitjeju.net/photomng/imgpath/202103/19/20210319024335214f0668-5a4f-4d1e-b31a-7a773e9482b0.jpg',
    mapUrl: 'https://map.kakao.com/?q=%ED%98%91%EC%9E%AC%ED%95%B4%EB%B3%80',
  },
  {
    title: '한라산 국립공원',
    description: '대한민국 최고봉. 계절마다 다른 풍경과 다양한 탐방로.',
    imageUrl: 'https://api.cdn.visitjeju.net/photomng/imgpath/201910/14/2019101409570831a2c4ff-fc02-48fa-b4c9-25ad33d93a69.jpg',
    mapUrl: 'https://map.kakao.com/?q=%ED%95%9C%EB%9D%BC%EC%82%B0',
  },
];
