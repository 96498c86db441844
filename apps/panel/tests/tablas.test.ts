// Pruebas de conversion de registros a tablas.
import { describe, expect, it } from 'vitest';
import { COLUMNAS_OCULTAS_EXAMEN, aFilasTabla, formatearTabla } from '../src/compartido/utilidades/tablas';
import { esquemaUsuarioRemoto } from '../src/modulos/modulo_usuarios/servicioUsuarios';

describe('aFilasTabla', () => {
  it('oculta columnas y aplana valores compuestos', () => {
    const filas = aFilasTabla(
      [{ id: 1, titulo: 'Parcial', creadorId: 2, preguntasIds: [3, 4], extra: { a: 1 }, nota: undefined }],
      COLUMNAS_OCULTAS_EXAMEN
    );

    expect(filas).toEqual([{ id: 1, titulo: 'Parcial', extra: '{"a":1}', nota: null }]);
  });
});

describe('formatearTabla', () => {
  it('genera encabezado y una linea tabulada por fila', () => {
    expect(
      formatearTabla([
        { id: 1, titulo: 'A', activo: true },
        { id: 2, titulo: null, activo: false }
      ])
    ).toEqual(['id\ttitulo\tactivo', '1\tA\ttrue', '2\t\tfalse']);
  });

  it('usa la union de columnas cuando las filas difieren', () => {
    const usuarios = [{ id: 1 }, { id: 2, nombre: 'Ana', correo: 'ana@example.com' }].map((registro) =>
      esquemaUsuarioRemoto.parse(registro)
    );

    expect(formatearTabla(aFilasTabla(usuarios))).toEqual([
      'id\tnombre\tcorreo',
      '1\t\t',
      '2\tAna\tana@example.com'
    ]);
  });

  it('no produce lineas sin filas', () => {
    expect(formatearTabla([])).toEqual([]);
  });
});
