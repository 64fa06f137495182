export * from './labyrinthMap.js'
export * from './mapCell.js'
