export interface ResearchResource {
  title: string;
  url: string;
  icon: string;
  category: string;
  description: string;
}

export const RESEARCH_RESOURCES: readonly ResearchResource[] = [
  {
    title: 'Research Publications',
    url: '/publications',
    icon: 'file-pdf',
    category: 'academic',
    description: 'Access our latest research papers and publications',
  },
  {
    title: 'Academic Programs',
    url: '/programs',
    icon: 'graduation-cap',
    category: 'education',
    description: 'Learn about our academic offerings and collaborations',
  },
  {
    title: 'Research Team',
    url: '/team',
    icon: 'users',
    category: 'people',
    description: 'Meet our researchers and faculty members',
  },
  {
    title: 'Facilities & Equipment',
    url: '/facilities',
    icon: 'microscope',
    category: 'infrastructure',
    description: 'Explore our laboratories and research equipment',
  },
];
