export const name = 'topic-rest-producer'
export const version = '1.0.0'
