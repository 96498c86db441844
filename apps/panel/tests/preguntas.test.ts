// Pruebas del servicio de preguntas.
import { describe, expect, it } from 'vitest';
import { crearServicioPreguntas } from '../src/modulos/modulo_preguntas/servicioPreguntas';
import { crearClienteApi } from '../src/servicios_api/clienteApi';
import { BASE_PRUEBA, crearFetchFalso, crearRegistradorFalso, json } from './utils/fetchFalso';

function crearServicio() {
  const fetcher = crearFetchFalso();
  const registrar = crearRegistradorFalso();
  const servicio = crearServicioPreguntas(crearClienteApi({ baseUrl: BASE_PRUEBA, token: 'test-token', fetcher, registrar }));
  return { servicio, fetcher, registrar };
}

describe('crear', () => {
  it('exige entre 2 y 6 opciones en seleccion unica', async () => {
    const { servicio, fetcher } = crearServicio();

    const pocas = await servicio.crear(1, {
      textoPregunta: '¿Si o no?',
      tipoPregunta: 'SELECCION_UNICA',
      opciones: [{ texto: 'Si' }]
    });
    const muchas = await servicio.crear(1, {
      textoPregunta: '¿Cual?',
      tipoPregunta: 'SELECCION_UNICA',
      opciones: ['a', 'b', 'c', 'd', 'e', 'f', 'g'].map((texto) => ({ texto }))
    });

    expect(pocas).toMatchObject({
      ok: false,
      error: { codigo: 'OPCIONES_INVALIDAS', mensaje: 'Se requieren al menos 2 opciones' }
    });
    expect(muchas).toMatchObject({
      ok: false,
      error: { codigo: 'OPCIONES_INVALIDAS', mensaje: 'Se permiten a lo mas 6 opciones' }
    });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('rechaza tipos desconocidos y puntos no positivos', async () => {
    const { servicio } = crearServicio();

    const tipo = await servicio.crear(1, { textoPregunta: 'Hola', tipoPregunta: 'VERDADERO_FALSO' });
    const puntos = await servicio.crear(1, { textoPregunta: 'Hola', tipoPregunta: 'TEXTO_ABIERTO', puntos: 0 });

    expect(tipo).toMatchObject({ ok: false, error: { tipo: 'VALIDACION', codigo: 'TIPO_PREGUNTA_INVALIDO' } });
    expect(puntos).toMatchObject({
      ok: false,
      error: { codigo: 'PUNTOS_INVALIDOS', mensaje: 'Los puntos deben ser un entero positivo' }
    });
  });

  it('no envia opciones en preguntas abiertas', async () => {
    const { servicio, fetcher } = crearServicio();
    fetcher.mockResolvedValue(json({ id: 40 }, 201));

    await servicio.crear(6, { textoPregunta: ' Describe ', tipoPregunta: 'TEXTO_ABIERTO' });

    expect(fetcher.mock.calls[0]?.[1]?.body).toBe(
      '{"textoPregunta":"Describe","tipoPregunta":"TEXTO_ABIERTO","examenId":6,"puntos":1}'
    );
  });
});

describe('listarDeExamen', () => {
  it('normaliza variantes de campos del backend', async () => {
    const { servicio, fetcher, registrar } = crearServicio();
    fetcher.mockResolvedValue(
      json([
        {
          id: 3,
          examenId: 2,
          textoPregunta: '¿Capital?',
          tipo: 'SELECCION_UNICA',
          puntos: '2',
          opciones: [
            { id: 31, textoPregunta: 'Paris', esCorrecta: true },
            { id: 32, texto: 'Roma' }
          ]
        },
        { id: 4, textoPregunta: 'Sin tipo' }
      ])
    );

    const resultado = await servicio.listarDeExamen(2);

    expect(fetcher.mock.calls[0]?.[0]).toBe(`${BASE_PRUEBA}/examenes/2/preguntas`);
    expect(resultado).toEqual({
      ok: true,
      valor: [
        {
          id: 3,
          examenId: 2,
          textoPregunta: '¿Capital?',
          tipoPregunta: 'SELECCION_UNICA',
          puntos: 2,
          opciones: [
            { id: 31, texto: 'Paris', esCorrecta: true },
            { id: 32, texto: 'Roma', esCorrecta: false }
          ]
        }
      ]
    });
    expect(registrar).toHaveBeenCalledWith('warn', 'Registros descartados por formato invalido', {
      recurso: 'preguntas',
      descartados: 1,
      url: `${BASE_PRUEBA}/examenes/2/preguntas`
    });
  });
});
