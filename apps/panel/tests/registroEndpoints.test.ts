// Pruebas del registro de endpoints.
import { describe, expect, it } from 'vitest';
import {
  RUTAS_POR_DEFECTO,
  resolverUrl,
  resolverUrlConSufijo,
  rutaDeRecurso,
  unirUrl
} from '../src/servicios_api/registroEndpoints';

describe('registroEndpoints', () => {
  it('resuelve recursos logicos contra la URL base', () => {
    expect(resolverUrl('http://localhost:5000/', 'examenes')).toBe('http://localhost:5000/examenes');
    expect(resolverUrl('http://localhost:5000', 'preguntas')).toBe('http://localhost:5000/preguntas');
    expect(resolverUrl('http://localhost:5000', 'usuarios')).toBe('http://localhost:5000/admin/users');
  });

  it('conserva la ruta de la URL base', () => {
    expect(resolverUrl('http://localhost:5000/api/', 'examenes')).toBe('http://localhost:5000/api/examenes');
  });

  it('agrega sufijos para recursos anidados', () => {
    expect(resolverUrlConSufijo('http://localhost:5000', 'examenes', '7/preguntas')).toBe(
      'http://localhost:5000/examenes/7/preguntas'
    );
    expect(resolverUrlConSufijo('http://localhost:5000', 'examenes', 7)).toBe('http://localhost:5000/examenes/7');
  });

  it('admite rutas configuradas para resultados', () => {
    const rutas = { ...RUTAS_POR_DEFECTO, resultados: 'api/respuestas/' };
    expect(resolverUrl('http://localhost:5000', 'resultados', rutas)).toBe('http://localhost:5000/api/respuestas');
  });

  it('normaliza barras repetidas entre segmentos', () => {
    expect(unirUrl('http://h//', '/a/', '//b')).toBe('http://h/a/b');
  });

  it('falla de inmediato ante un recurso desconocido', () => {
    expect(() => rutaDeRecurso('calificaciones')).toThrow('Recurso de API desconocido: calificaciones');
    expect(() => rutaDeRecurso('toString')).toThrow('Recurso de API desconocido: toString');
  });
});
