// Pruebas del cliente API (errores tipados, encabezados y cuerpos).
import { describe, expect, it } from 'vitest';
import { crearClienteApi } from '../src/servicios_api/clienteApi';
import { BASE_PRUEBA, crearFetchFalso, crearRegistradorFalso, json, respuesta } from './utils/fetchFalso';

function crearCliente(opts: { timeoutMs?: number; rutas?: { resultados?: string } } = {}) {
  const fetcher = crearFetchFalso();
  const registrar = crearRegistradorFalso();
  const cliente = crearClienteApi({ baseUrl: BASE_PRUEBA, token: 'test-token', fetcher, registrar, ...opts });
  return { cliente, fetcher, registrar };
}

describe('clienteApi', () => {
  it('envia Accept y Authorization en cada GET', async () => {
    const { cliente, fetcher } = crearCliente();
    fetcher.mockResolvedValue(json([{ id: 1 }]));

    const resultado = await cliente.solicitar('GET', { nombre: 'examenes' });

    expect(resultado).toEqual({ ok: true, valor: { status: 200, url: `${BASE_PRUEBA}/examenes`, datos: [{ id: 1 }] } });
    expect(fetcher).toHaveBeenCalledTimes(1);
    const [url, init] = fetcher.mock.calls[0] ?? [];
    expect(url).toBe(`${BASE_PRUEBA}/examenes`);
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-token' });
    expect(init?.body).toBeUndefined();
  });

  it('serializa el cuerpo y agrega Content-Type', async () => {
    const { cliente, fetcher } = crearCliente();
    fetcher.mockResolvedValue(json({ id: 9 }, 201));

    await cliente.solicitar('POST', { nombre: 'preguntas' }, { cuerpo: { textoPregunta: 'Hola' } });

    const init = fetcher.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token'
    });
    expect(init?.body).toBe('{"textoPregunta":"Hola"}');
  });

  it('no permite que un encabezado propio reemplace la autorizacion', async () => {
    const { cliente, fetcher } = crearCliente();
    fetcher.mockResolvedValue(json([]));

    await cliente.solicitar('GET', { nombre: 'examenes' }, { encabezados: { Authorization: 'otro', 'X-Traza': 'a1' } });

    expect(fetcher.mock.calls[0]?.[1]?.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer test-token',
      'X-Traza': 'a1'
    });
  });

  it('descarta authorization propio en cualquier capitalizacion', async () => {
    const { cliente, fetcher } = crearCliente();
    fetcher.mockResolvedValue(json([]));

    await cliente.solicitar('GET', { nombre: 'examenes' }, { encabezados: { authorization: 'otro', AUTHORIZATION: 'x' } });

    const encabezados = fetcher.mock.calls[0]?.[1]?.headers;
    expect(encabezados).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-token' });
    expect(new Headers(encabezados).get('authorization')).toBe('Bearer test-token');
  });

  it('agrega parametros de consulta omitiendo los indefinidos', async () => {
    const { cliente, fetcher } = crearCliente();
    fetcher.mockResolvedValue(json([]));

    await cliente.solicitar('GET', { nombre: 'examenes' }, { consulta: { q: 'a b', pagina: 2, vacio: undefined } });

    expect(fetcher.mock.calls[0]?.[0]).toBe(`${BASE_PRUEBA}/examenes?q=a+b&pagina=2`);
  });

  it('usa la ruta configurada para resultados', async () => {
    const { cliente, fetcher } = crearCliente({ rutas: { resultados: '/api/respuestas' } });
    fetcher.mockResolvedValue(respuesta({ status: 201 }));

    await cliente.solicitar('POST', { nombre: 'resultados' }, { cuerpo: {}, esperaCuerpo: false });

    expect(fetcher.mock.calls[0]?.[0]).toBe(`${BASE_PRUEBA}/api/respuestas`);
  });

  it('reporta fallas de red como CONEXION con la causa', async () => {
    const { cliente, fetcher, registrar } = crearCliente();
    fetcher.mockRejectedValue(new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:5000') }));

    const resultado = await cliente.solicitar('GET', { nombre: 'examenes' });

    expect(resultado).toEqual({
      ok: false,
      error: {
        tipo: 'CONEXION',
        mensaje: 'fetch failed: connect ECONNREFUSED 127.0.0.1:5000',
        url: `${BASE_PRUEBA}/examenes`
      }
    });
    expect(registrar).toHaveBeenCalledWith('warn', 'Solicitud a la API fallida', {
      metodo: 'GET',
      tipo: 'CONEXION',
      url: `${BASE_PRUEBA}/examenes`
    });
  });

  it('aborta la solicitud al vencer el tiempo de espera', async () => {
    const { cliente, fetcher } = crearCliente({ timeoutMs: 5 });
    fetcher.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(Object.assign(new Error('aborted'), { name: 'AbortError' })));
        })
    );

    const resultado = await cliente.solicitar('GET', { nombre: 'examenes' });

    expect(resultado).toEqual({
      ok: false,
      error: { tipo: 'CONEXION', mensaje: 'Tiempo de espera agotado (5 ms)', url: `${BASE_PRUEBA}/examenes` }
    });
  });

  it('devuelve HTTP con estado y fragmento del cuerpo ante un no-2xx', async () => {
    const { cliente, fetcher, registrar } = crearCliente();
    fetcher.mockResolvedValue(respuesta({ status: 500, cuerpo: 'boom', tipoContenido: 'text/plain' }));

    const resultado = await cliente.solicitar('GET', { nombre: 'examenes' });

    expect(resultado).toEqual({
      ok: false,
      error: { tipo: 'HTTP', status: 500, url: `${BASE_PRUEBA}/examenes`, fragmentoCuerpo: 'boom' }
    });
    expect(registrar).toHaveBeenCalledWith('warn', 'Solicitud a la API fallida', {
      metodo: 'GET',
      tipo: 'HTTP',
      url: `${BASE_PRUEBA}/examenes`,
      status: 500
    });
  });

  it('recorta el fragmento del cuerpo a 500 caracteres', async () => {
    const { cliente, fetcher } = crearCliente();
    fetcher.mockResolvedValue(respuesta({ status: 502, cuerpo: 'x'.repeat(600), tipoContenido: 'text/plain' }));

    const resultado = await cliente.solicitar('GET', { nombre: 'examenes' });

    expect(resultado.ok).toBe(false);
    if (resultado.ok || resultado.error.tipo !== 'HTTP') throw new Error('se esperaba error HTTP');
    expect(resultado.error.fragmentoCuerpo).toBe(`${'x'.repeat(500)}...`);
  });

  it('rechaza un 2xx que no es JSON', async () => {
    const { cliente, fetcher } = crearCliente();
    fetcher.mockResolvedValue(respuesta({ cuerpo: '<html></html>', tipoContenido: 'text/html' }));

    const resultado = await cliente.solicitar('GET', { nombre: 'examenes' });

    expect(resultado).toEqual({
      ok: false,
      error: {
        tipo: 'TIPO_CONTENIDO',
        tipoContenido: 'text/html',
        fragmentoCuerpo: '<html></html>',
        url: `${BASE_PRUEBA}/examenes`
      }
    });
  });

  it('acepta application/json sin importar mayusculas ni charset', async () => {
    const { cliente, fetcher } = crearCliente();
    fetcher.mockResolvedValue(respuesta({ cuerpo: '[]', tipoContenido: 'Application/JSON; charset=utf-8' }));

    const resultado = await cliente.solicitar('GET', { nombre: 'examenes' });

    expect(resultado).toEqual({ ok: true, valor: { status: 200, url: `${BASE_PRUEBA}/examenes`, datos: [] } });
  });

  it('reporta DECODIFICACION cuando el JSON esta malformado', async () => {
    const { cliente, fetcher } = crearCliente();
    fetcher.mockResolvedValue(respuesta({ cuerpo: '{malo' }));

    const resultado = await cliente.solicitar('GET', { nombre: 'examenes' });

    expect(resultado).toMatchObject({
      ok: false,
      error: { tipo: 'DECODIFICACION', fragmentoCuerpo: '{malo', url: `${BASE_PRUEBA}/examenes` }
    });
  });

  it('trata 204 y cuerpos vacios como cero registros', async () => {
    const { cliente, fetcher } = crearCliente();
    fetcher.mockResolvedValueOnce(respuesta({ status: 204 }));
    fetcher.mockResolvedValueOnce(respuesta({ cuerpo: '  ' }));

    const sinContenido = await cliente.solicitar('GET', { nombre: 'examenes' });
    const vacio = await cliente.solicitar('GET', { nombre: 'examenes' });

    expect(sinContenido).toEqual({ ok: true, valor: { status: 204, url: `${BASE_PRUEBA}/examenes`, datos: [] } });
    expect(vacio).toEqual({ ok: true, valor: { status: 200, url: `${BASE_PRUEBA}/examenes`, datos: [] } });
  });

  it('exige el estado esperado cuando se indica', async () => {
    const { cliente, fetcher } = crearCliente();
    fetcher.mockResolvedValue(respuesta({ status: 200, cuerpo: 'ok', tipoContenido: 'text/plain' }));

    const resultado = await cliente.solicitar('POST', { nombre: 'resultados' }, { cuerpo: {}, estadoEsperado: 201 });

    expect(resultado).toEqual({
      ok: false,
      error: { tipo: 'HTTP', status: 200, url: `${BASE_PRUEBA}/resultados`, fragmentoCuerpo: 'ok' }
    });
  });

  it('descarta el cuerpo cuando no se espera contenido', async () => {
    const { cliente, fetcher } = crearCliente();
    fetcher.mockResolvedValue(respuesta({ status: 200, cuerpo: 'actualizado', tipoContenido: 'text/plain' }));

    const resultado = await cliente.solicitar('PUT', { nombre: 'examenes', sufijo: 3 }, { cuerpo: {}, esperaCuerpo: false });

    expect(resultado).toEqual({ ok: true, valor: { status: 200, url: `${BASE_PRUEBA}/examenes/3`, datos: [] } });
  });
});
