import {
  CmsBoardAdapter,
  dateByColumn,
  dateBySelector,
  numberCellSays,
  type CmsBoardLayout,
} from './common/cms-board';
import type { SourceDefinition } from '../types/notice';

type Board = Omit<SourceDefinition, 'fetchMode'> & { layout?: CmsBoardLayout };

// `tbody tr` boards with `.b-num-box.num-notice` pins and a `.b-date` column
const numberedBoard: CmsBoardLayout = {
  rows: ['tbody tr'],
  pinned: row => row.find('.b-num-box.num-notice').length > 0,
};

// Pinned rows are listed ahead of the regular ones
const pinnedFirstBoard: CmsBoardLayout = {
  rows: ['tr.b-top-box', 'table.board-table > tbody > tr:not(.b-top-box)'],
  title: 'td.b-td-left div.b-title-box a',
  date: dateBySelector('span.b-date', 'td:nth-child(4)'),
};

const boards: Board[] = [
  {
    id: 'climatechange_academic',
    name: '기후변화대응사업단 공지사항',
    url: 'https://cms.kookmin.ac.kr/climatechange/community/notice.do',
    category: 'climate_change',
    layout: {
      skipRow: row => row.find('input[type="hidden"]').length > 0,
      date: dateByColumn(4),
    },
  },
  {
    id: 'coss_academic',
    name: '미래자동차 혁신융합대학 공지사항',
    url: 'https://coss.kookmin.ac.kr/fvedu/community/notice.do',
    category: 'automotive',
    layout: numberedBoard,
  },
  {
    id: 'creativeengineering_civil_academic',
    name: '건설시스템공학부 공지사항',
    url: 'https://cms.kookmin.ac.kr/cee/bbs/notice.do',
    category: 'creative_engineering',
    layout: { rows: ['tbody tr'], pinned: row => row.hasClass('b-top-box') },
  },
  {
    id: 'creativeengineering_mechanical_academic',
    name: '기계공학부 공지사항',
    url: 'http://cms.kookmin.ac.kr/mech/bbs/notice.do',
    category: 'creative_engineering',
    layout: { title: '.b-td-left a', date: dateByColumn(-1) },
  },
  {
    id: 'design_automotive_academic',
    name: '자동차운송디자인학과 취업정보',
    url: 'https://mobility.kookmin.ac.kr/mobility/etc-board/employment-information.do',
    category: 'design',
    layout: numberedBoard,
  },
  {
    id: 'design_industrial_academic',
    name: '공업디자인학과 공지사항',
    url: 'https://id.kookmin.ac.kr/id/intro/notice.do',
    category: 'design',
    layout: { pinned: row => row.find('.num-notice').length > 0, date: dateByColumn(-2) },
  },
  {
    id: 'globalhumanities_eurasian_academic',
    name: '러시아유라시아학과 학과공지',
    url: 'https://cms.kookmin.ac.kr/Russian-EurasianStudies/community/department-notice.do',
    category: 'global_humanities',
    layout: pinnedFirstBoard,
  },
  {
    id: 'law_academic',
    name: '법과대학 공지사항',
    url: 'https://law.kookmin.ac.kr/law/etc-board/notice01.do',
    category: 'law',
    layout: { date: dateByColumn(-2) },
  },
  {
    id: 'physicaleducation_academic',
    name: '체육대학 공지사항',
    url: 'https://sport.kookmin.ac.kr/sports/notice/notice01.do',
    category: 'physical_education',
    layout: {
      title: 'td.b-td-left div.b-title-box a',
      pinned: numberCellSays('td.b-num-box.num-notice'),
      date: dateBySelector('span.b-date', 'td:nth-child(4)'),
    },
  },
  {
    id: 'sciencetechnology_security_academic',
    name: '정보보안암호수학과 학사공지',
    url: 'https://cns.kookmin.ac.kr/cns/notice/academic-notice.do',
    category: 'science_technology',
    layout: { rows: ['tbody tr'], pinned: numberCellSays('.b-num-box span') },
  },
  {
    id: 'socialscience_academic',
    name: '사회과학대학 공지사항',
    url: 'https://social.kookmin.ac.kr/social/menu/social_notice.do',
    category: 'social_science',
    layout: {
      title: 'td.b-td-left div.b-title-box a',
      date: dateBySelector('span.b-date', 'td:nth-child(4)'),
    },
  },
  {
    id: 'socialscience_communication_media_academic',
    name: '미디어·광고학부 전공공지',
    url: 'https://kmumedia.kookmin.ac.kr/kmumedia/community/major-notice.do',
    category: 'social_science',
    layout: numberedBoard,
  },
  {
    id: 'socialscience_politicalscience_academic',
    name: '정치외교학과 공지사항',
    url: 'https://polisci.kookmin.ac.kr/polisci/etc-board/board02.do',
    category: 'social_science',
    layout: numberedBoard,
  },
  {
    id: 'socialscience_sociology_academic',
    name: '사회학과 전공공지',
    url: 'https://kmusoc.kookmin.ac.kr/kmusoc/etc-board/major_notice.do',
    category: 'social_science',
    layout: numberedBoard,
  },
  {
    id: 'socialscience_publicadministration_academic',
    name: '행정학과 공지사항',
    url: 'http://cms.kookmin.ac.kr/paap/notice/notice.do',
    category: 'social_science',
    layout: { link: 'articleNo', date: dateBySelector('td:nth-last-child(2)') },
  },
  {
    id: 'softwarecentered_academic',
    name: '소프트웨어융합대학 공지사항',
    url: 'https://software.kookmin.ac.kr/software/bulletin/notice.do',
    category: 'software',
    layout: { rows: ['table tbody tr'], link: 'articleNo', date: dateBySelector('td:nth-child(6)') },
  },
];

export const cmsBoards: CmsBoardAdapter[] = boards.map(
  ({ layout, ...definition }) => new CmsBoardAdapter({ ...definition, fetchMode: 'http' }, layout)
);
