export * from './misc';
export * from './expect';
