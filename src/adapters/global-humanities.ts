import { FeedSourceAdapter } from './common/feed';

export const globalHumanitiesRss = new FeedSourceAdapter({
  id: 'globalhumanities_academic_rss',
  name: '글로벌인문지역대학 공지사항',
  url: 'https://cha.kookmin.ac.kr/community/college/notice/rss',
  category: 'global_humanities',
  fetchMode: 'http',
});
